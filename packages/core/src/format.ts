// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Format Adapter contract.
 *
 * A format maps a typed value to bytes and back and describes itself through a
 * DataTypeInfo. Implementations: raw bytes and UTF-8 strings (this package),
 * JSON/CBOR/MessagePack (`@ferry/serde`), Protobuf (`@ferry/protobuf`).
 */

import type { DataTypeInfo } from "./types.js";

/**
 * Buffer ownership on receive.
 *
 * - `copy`: the trampoline copies the transport buffer before decoding, so the
 *   decoded value (and any subarray of it) may outlive the callback
 * - `borrow`: decode reads straight from the transport buffer; the value and the
 *   envelope are only valid until the callback returns
 */
export type ReceiveMode = "copy" | "borrow";

export interface MessageFormat<T> {
  /** Short stable tag identifying the format */
  readonly encoding: string;

  /** Buffer ownership on receive (default: "copy") */
  readonly receive?: ReceiveMode;

  /**
   * Type metadata for this message type. Called once per endpoint.
   */
  dataType(): DataTypeInfo;

  /**
   * Encode a message. Throws SerializationError for values the format cannot
   * represent; that is a programming error, not a runtime condition.
   */
  encode(value: T): Uint8Array;

  /**
   * Decode a payload. Returns undefined on malformed input and never throws for
   * untrusted bytes.
   */
  decode(bytes: Uint8Array, dataType: DataTypeInfo): T | undefined;
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Payload validator contract.
 *
 * Structured formats run decoded values through a validator so that a subscriber
 * only ever sees values of its declared type. Implementations: `@ferry/zod`,
 * `@ferry/valibot`.
 */
export interface PayloadValidator<T> {
  /** Declared type name, used as DataTypeInfo.typeName when present */
  readonly typeName?: string;

  /** Schema blob, used as DataTypeInfo.descriptor when present */
  readonly descriptor?: Uint8Array;

  safeParse(value: unknown): ParseResult<T>;
}

/**
 * Validator that accepts any value unchanged.
 */
export const anyValidator: PayloadValidator<unknown> = {
  safeParse: (value) => ({ success: true, data: value }),
};
