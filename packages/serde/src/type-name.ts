// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

const OPENERS = new Set(["<", "[", "("]);
const CLOSERS = new Set([">", "]", ")"]);

/**
 * Last path segment of a qualified type name.
 *
 * Splits on `::` and `.`, ignoring separators inside generic brackets. A name that
 * ends in a separator is returned unchanged.
 *
 * @example
 * ```typescript
 * shortTypeName("app::nested::deep::TestType"); // "TestType"
 * shortTypeName("telemetry.v1.Reading");        // "Reading"
 * shortTypeName("std::Vec<app::Item>");         // "Vec<app::Item>"
 * ```
 */
export function shortTypeName(name: string): string {
  let depth = 0;
  let start = 0;
  for (let i = 0; i < name.length; i++) {
    const ch = name.charAt(i);
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      if (ch === ".") {
        start = i + 1;
      } else if (ch === ":" && name.charAt(i + 1) === ":") {
        start = i + 2;
        i++;
      }
    }
  }
  const short = name.slice(start);
  return short.length > 0 ? short : name;
}
