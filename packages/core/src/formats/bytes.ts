// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createDataTypeInfo } from "../data-type.js";
import type { MessageFormat, ReceiveMode } from "../format.js";
import type { PayloadWriter } from "../payload-writer.js";

export const RAW_ENCODING = "raw";
export const BYTES_TYPE_NAME = "bytes";

export interface BytesFormatOptions {
  /**
   * Buffer ownership on receive (default: "borrow").
   * With "borrow", the payload is a view of transport memory and is only valid
   * inside the callback; copy it to keep it.
   */
  receive?: ReceiveMode;
}

/**
 * Raw binary messages: encode and decode are the identity.
 *
 * @example
 * ```typescript
 * const subscriber = createTypedSubscriber(transport, "blob", bytesFormat());
 * subscriber.setCallback(({ payload }) => store(payload.slice()));
 * ```
 */
export function bytesFormat(
  options: BytesFormatOptions = {},
): MessageFormat<Uint8Array> {
  const dataType = createDataTypeInfo(RAW_ENCODING, BYTES_TYPE_NAME);
  return {
    encoding: RAW_ENCODING,
    receive: options.receive ?? "borrow",
    dataType: () => dataType,
    encode: (value) => value,
    decode: (bytes) => bytes,
  };
}

/**
 * PayloadWriter that copies `data` into the transport buffer.
 *
 * On buffer reuse only the bytes that differ from the previous send are written.
 */
export function bytesWriter(data: Uint8Array): PayloadWriter {
  return {
    getSize: () => data.length,
    writeFull(buffer) {
      buffer.set(data);
      return true;
    },
    writeModified(buffer) {
      for (let i = 0; i < data.length; i++) {
        const byte = data[i];
        if (byte !== undefined && buffer[i] !== byte) buffer[i] = byte;
      }
      return true;
    },
  };
}
