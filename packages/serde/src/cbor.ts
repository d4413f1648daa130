// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { decodeCBOR, encodeCBOR, type CBORType } from "@levischuck/tiny-cbor";
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

export const CBOR_ENCODING = "cbor";

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Plain data → CBOR data model. Objects become string-keyed maps; `undefined`
 * object fields are skipped and `undefined` array items become null, as in JSON.
 */
function toCbor(value: unknown): CBORType {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return value;
    case "object":
      break;
    default:
      throw new SerializationError(
        `Value of type ${typeof value} has no CBOR representation`,
      );
  }
  if (value === null) return null;
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (item === undefined ? null : toCbor(item)));
  }
  if (value instanceof Map) {
    const out = new Map<string | number, CBORType>();
    for (const [key, item] of value) {
      if (typeof key !== "string" && typeof key !== "number") {
        throw new SerializationError("CBOR map keys must be strings or numbers");
      }
      out.set(key, toCbor(item));
    }
    return out;
  }
  if (!isPlainObject(value)) {
    throw new SerializationError(
      `${value.constructor.name} instances have no CBOR representation`,
    );
  }
  const out = new Map<string | number, CBORType>();
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) out.set(key, toCbor(item));
  }
  return out;
}

/**
 * CBOR data model → plain data. Maps become objects with stringified keys.
 */
function fromCbor(value: CBORType): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value, ([key, item]) => [String(key), fromCbor(item)]),
    );
  }
  if (Array.isArray(value)) return value.map(fromCbor);
  return value;
}

// Byte strings decode as views into the input, so receive copies.
const cborCodec: Codec = {
  encoding: CBOR_ENCODING,
  receive: "copy",
  encode: (value) => encodeCBOR(toCbor(value)),
  decode: (bytes) =>
    fromCbor(
      decodeCBOR(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)),
    ),
};

/**
 * CBOR (RFC 8949) messages via `@levischuck/tiny-cbor`.
 *
 * Plain objects travel as string-keyed maps and come back as plain objects.
 */
export function cborFormat(options?: SerdeFormatOptions): MessageFormat<unknown>;
export function cborFormat<T>(
  validator: PayloadValidator<T>,
  options?: SerdeFormatOptions,
): MessageFormat<T>;
export function cborFormat<T>(
  first?: PayloadValidator<T> | SerdeFormatOptions,
  second?: SerdeFormatOptions,
): MessageFormat<T> | MessageFormat<unknown> {
  const [validator, options] = splitArgs(first, second);
  return validator
    ? structuredFormat(cborCodec, validator, options)
    : structuredFormat(cborCodec, anyValidator, options);
}
