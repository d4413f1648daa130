// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { decode, encode } from "@msgpack/msgpack";
import {
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

export const MSGPACK_ENCODING = "msgpack";

// Decoded binary fields are views into the input, so receive copies.
const msgpackCodec: Codec = {
  encoding: MSGPACK_ENCODING,
  receive: "copy",
  encode: (value) => encode(value),
  decode: (bytes) => decode(bytes),
};

/**
 * MessagePack messages via `@msgpack/msgpack`.
 */
export function msgpackFormat(
  options?: SerdeFormatOptions,
): MessageFormat<unknown>;
export function msgpackFormat<T>(
  validator: PayloadValidator<T>,
  options?: SerdeFormatOptions,
): MessageFormat<T>;
export function msgpackFormat<T>(
  first?: PayloadValidator<T> | SerdeFormatOptions,
  second?: SerdeFormatOptions,
): MessageFormat<T> | MessageFormat<unknown> {
  const [validator, options] = splitArgs(first, second);
  return validator
    ? structuredFormat(msgpackCodec, validator, options)
    : structuredFormat(msgpackCodec, anyValidator, options);
}
