// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  SerializationError,
  createDataTypeInfo,
  validateOptionKeys,
  type MessageFormat,
  type PayloadValidator,
  type ReceiveMode,
} from "@ferry/core";
import { shortTypeName } from "./type-name.js";

export interface SerdeFormatOptions {
  /**
   * Declared type name. Overrides the validator's; shortened with `shortTypeName()`.
   * Empty when neither is given.
   */
  typeName?: string;

  /**
   * Run the validator on outgoing values too (default: false). A rejected value
   * throws SerializationError.
   */
  validateOutgoing?: boolean;
}

/**
 * Byte codec behind a structured format. `decode` may throw on malformed input.
 *
 * `receive` is "copy" when decoded values can hold views into the input bytes.
 * @internal
 */
export interface Codec {
  readonly encoding: string;
  readonly receive: ReceiveMode;
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}

const OPTION_KEYS = ["typeName", "validateOutgoing"] as const;

/**
 * Split the `(validator?, options?)` arguments shared by the serde formats.
 * @internal
 */
export function splitArgs<T>(
  first: PayloadValidator<T> | SerdeFormatOptions | undefined,
  second: SerdeFormatOptions | undefined,
): [PayloadValidator<T> | undefined, SerdeFormatOptions] {
  if (first !== undefined && "safeParse" in first) return [first, second ?? {}];
  return [undefined, first ?? second ?? {}];
}

/**
 * Build a MessageFormat from a codec and a validator.
 *
 * Decoding runs the codec, then the validator; either failing yields `undefined`.
 * Encoding failures throw SerializationError.
 * @internal
 */
export function structuredFormat<T>(
  codec: Codec,
  validator: PayloadValidator<T>,
  options: SerdeFormatOptions,
): MessageFormat<T> {
  validateOptionKeys(options, OPTION_KEYS, `${codec.encoding} format`);

  const typeName = shortTypeName(options.typeName ?? validator.typeName ?? "");
  const dataType = createDataTypeInfo(
    codec.encoding,
    typeName,
    validator.descriptor,
  );
  const validateOutgoing = options.validateOutgoing ?? false;

  return {
    encoding: codec.encoding,
    receive: codec.receive,
    dataType: () => dataType,

    encode(value) {
      if (validateOutgoing) {
        const result = validator.safeParse(value);
        if (!result.success) {
          throw new SerializationError(
            `Outgoing ${codec.encoding} message failed validation: ${result.error}`,
          );
        }
      }
      try {
        return codec.encode(value);
      } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(
          `Failed to encode ${codec.encoding} message`,
          { cause: err },
        );
      }
    },

    decode(bytes) {
      let value: unknown;
      try {
        value = codec.decode(bytes);
      } catch {
        return undefined;
      }
      const result = validator.safeParse(value);
      return result.success ? result.data : undefined;
    },
  };
}
