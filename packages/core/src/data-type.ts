// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { InvalidNameError } from "./errors.js";
import type { DataTypeInfo } from "./types.js";

const EMPTY_DESCRIPTOR = new Uint8Array(0);

// NUL terminates names on the transport side; lone surrogates have no UTF-8 form.
const UNREPRESENTABLE =
  /\0|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Build an immutable DataTypeInfo. The descriptor is copied, so later writes to the
 * caller's buffer never reach the transport metadata.
 */
export function createDataTypeInfo(
  encoding: string,
  typeName: string,
  descriptor: Uint8Array = EMPTY_DESCRIPTOR,
): DataTypeInfo {
  return Object.freeze({
    encoding,
    typeName,
    descriptor: descriptor.length === 0 ? EMPTY_DESCRIPTOR : descriptor.slice(),
  });
}

export function copyDataTypeInfo(info: DataTypeInfo): DataTypeInfo {
  return createDataTypeInfo(info.encoding, info.typeName, info.descriptor);
}

/**
 * DataTypeInfo used when the transport delivers no metadata.
 */
export const EMPTY_DATA_TYPE: DataTypeInfo = createDataTypeInfo("", "");

export function dataTypeEquals(a: DataTypeInfo, b: DataTypeInfo): boolean {
  if (a.encoding !== b.encoding || a.typeName !== b.typeName) return false;
  if (a.descriptor.length !== b.descriptor.length) return false;
  return a.descriptor.every((byte, i) => byte === b.descriptor[i]);
}

/**
 * Throws InvalidNameError when `value` cannot be handed to the transport.
 */
export function assertTransportString(
  value: string,
  what: string,
  topic?: string,
): void {
  if (UNREPRESENTABLE.test(value)) {
    throw new InvalidNameError(
      `Invalid ${what} ${JSON.stringify(value)}: contains a NUL character or an unpaired surrogate`,
      topic === undefined ? undefined : { topic },
    );
  }
}

/**
 * Validate a topic name and the strings of its DataTypeInfo before handle creation.
 */
export function assertEndpointNames(
  topicName: string,
  dataType: DataTypeInfo,
): void {
  if (topicName.length === 0) {
    throw new InvalidNameError("Topic name must not be empty");
  }
  assertTransportString(topicName, "topic name", topicName);
  assertTransportString(dataType.encoding, "encoding", topicName);
  assertTransportString(dataType.typeName, "type name", topicName);
}
