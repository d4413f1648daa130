// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createDataTypeInfo } from "../data-type.js";
import type { MessageFormat } from "../format.js";

export const STRING_ENCODING = "utf-8";
export const STRING_TYPE_NAME = "string";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * UTF-8 text messages. Invalid UTF-8 on receive is dropped, not replaced.
 */
export function stringFormat(): MessageFormat<string> {
  const dataType = createDataTypeInfo(STRING_ENCODING, STRING_TYPE_NAME);
  return {
    encoding: STRING_ENCODING,
    receive: "borrow",
    dataType: () => dataType,
    encode: (value) => encoder.encode(value),
    decode(bytes) {
      try {
        return decoder.decode(bytes);
      } catch {
        return undefined;
      }
    },
  };
}
