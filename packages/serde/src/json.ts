// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  SerializationError,
  anyValidator,
  type MessageFormat,
  type PayloadValidator,
} from "@ferry/core";
import {
  splitArgs,
  structuredFormat,
  type Codec,
  type SerdeFormatOptions,
} from "./structured.js";

export const JSON_ENCODING = "json";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

const jsonCodec: Codec = {
  encoding: JSON_ENCODING,
  receive: "borrow",
  encode(value) {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new SerializationError(
        `Value of type ${typeof value} has no JSON representation`,
      );
    }
    return encoder.encode(text);
  },
  decode: (bytes) => JSON.parse(decoder.decode(bytes)),
};

/**
 * UTF-8 JSON messages.
 *
 * Without a validator the payload type is `unknown`; pass one (`zodValidator`,
 * `valibotValidator`) to receive only values of its type.
 *
 * @example
 * ```typescript
 * const format = jsonFormat(zodValidator(Simple));
 * const subscriber = createTypedSubscriber(transport, "simple", format);
 * ```
 */
export function jsonFormat(options?: SerdeFormatOptions): MessageFormat<unknown>;
export function jsonFormat<T>(
  validator: PayloadValidator<T>,
  options?: SerdeFormatOptions,
): MessageFormat<T>;
export function jsonFormat<T>(
  first?: PayloadValidator<T> | SerdeFormatOptions,
  second?: SerdeFormatOptions,
): MessageFormat<T> | MessageFormat<unknown> {
  const [validator, options] = splitArgs(first, second);
  return validator
    ? structuredFormat(jsonCodec, validator, options)
    : structuredFormat(jsonCodec, anyValidator, options);
}
