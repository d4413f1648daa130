// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @ferry/protobuf - Protobuf messages for Ferry endpoints via protobufjs
 */

export { PROTO_ENCODING, protobufFormat } from "./format.js";
export type { ProtoObject, ProtobufFormatOptions } from "./format.js";
