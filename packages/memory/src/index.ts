// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-process transport for single-process deployments, samples and tests.
 *
 * Exports:
 * - `memoryTransport()`: topic registry with memfile buffers and ordered delivery
 */

export { memoryTransport } from "./transport.js";
export type {
  Clock,
  DispatchMode,
  MemoryTransport,
  MemoryTransportOptions,
} from "./transport.js";
