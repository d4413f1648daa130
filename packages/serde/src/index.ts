// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Structured message formats for @ferry/core.
 *
 * - `jsonFormat()`: UTF-8 JSON
 * - `cborFormat()`: CBOR via @levischuck/tiny-cbor
 * - `msgpackFormat()`: MessagePack via @msgpack/msgpack
 *
 * Each takes an optional PayloadValidator; decoded values it rejects are dropped.
 */

export { CBOR_ENCODING, cborFormat } from "./cbor.js";
export { JSON_ENCODING, jsonFormat } from "./json.js";
export { MSGPACK_ENCODING, msgpackFormat } from "./msgpack.js";
export type { SerdeFormatOptions } from "./structured.js";
export { shortTypeName } from "./type-name.js";
