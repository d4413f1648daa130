// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Zero-copy payload writer contract and the bridge the transport calls into.
 *
 * The transport's writer callbacks carry no user data, so the writer of the send in
 * progress sits in a single slot. Module state is per isolate, and every Node.js
 * worker thread has its own isolate: the slot is thread-local by construction.
 */

import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "./logger.js";
import {
  SEND_FAILED,
  SEND_OK,
  type SendStatus,
  type TransportPayloadWriter,
} from "./transport.js";

/**
 * A zero-copy payload writer: fills the transport buffer in place.
 *
 * @example
 * ```typescript
 * class Fill implements PayloadWriter {
 *   getSize() { return 1024; }
 *   writeFull(buf: Uint8Array) { buf.fill(0x2a); return true; }
 * }
 * publisher.sendPayloadWriter(new Fill());
 * ```
 */
export interface PayloadWriter {
  /**
   * Exact number of bytes the writer produces. Called before allocation.
   */
  getSize(): number;

  /**
   * Fill a freshly allocated buffer of exactly `getSize()` bytes.
   * Returning false aborts the send.
   */
  writeFull(buffer: Uint8Array): boolean;

  /**
   * Update a buffer that already holds the previous payload of the same size.
   * Falls back to `writeFull` when omitted.
   */
  writeModified?(buffer: Uint8Array): boolean;
}

/**
 * Holds the writer of the zero-copy send in progress.
 *
 * INVARIANT: empty outside of `sendPayloadWriter`. `failed` records whether any
 * callback of the current send reported failure.
 */
export class ActiveWriterSlot {
  #writer: PayloadWriter | undefined;
  #logger: LoggerAdapter = noopLogger;
  #failed = false;

  get current(): PayloadWriter | undefined {
    return this.#writer;
  }

  get failed(): boolean {
    return this.#failed;
  }

  /**
   * Install `writer`. Returns false when another send already holds the slot.
   */
  occupy(writer: PayloadWriter, logger: LoggerAdapter = noopLogger): boolean {
    if (this.#writer !== undefined) return false;
    this.#writer = writer;
    this.#logger = logger;
    this.#failed = false;
    return true;
  }

  release(): void {
    this.#writer = undefined;
    this.#logger = noopLogger;
    this.#failed = false;
  }

  /** @internal */
  write(buffer: Uint8Array, size: number, modified: boolean): SendStatus {
    const writer = this.#writer;
    if (writer === undefined) return SEND_FAILED;

    const status = this.#write(writer, buffer, size, modified);
    if (status !== SEND_OK) this.#failed = true;
    return status;
  }

  /** @internal */
  size(): number {
    const writer = this.#writer;
    if (writer === undefined) return 0;
    try {
      const declared = writer.getSize();
      if (Number.isSafeInteger(declared) && declared >= 0) return declared;
      this.#failed = true;
      this.#logger.warn(LOG_CONTEXT.WRITER, "Invalid declared size", {
        declared,
      });
      return 0;
    } catch (err) {
      this.#failed = true;
      this.#logger.error(LOG_CONTEXT.WRITER, "getSize() threw", err);
      return 0;
    }
  }

  #write(
    writer: PayloadWriter,
    buffer: Uint8Array,
    size: number,
    modified: boolean,
  ): SendStatus {
    try {
      const declared = writer.getSize();
      if (!Number.isSafeInteger(declared) || declared < 0) {
        this.#logger.warn(LOG_CONTEXT.WRITER, "Invalid declared size", {
          declared,
        });
        return SEND_FAILED;
      }

      // The transport may hand over a larger memfile; the writer sees exactly its size.
      const available = Math.min(size, buffer.length);
      if (available < declared) {
        this.#logger.warn(LOG_CONTEXT.WRITER, "Buffer shorter than declared size", {
          declared,
          available,
        });
        return SEND_FAILED;
      }

      const view = buffer.subarray(0, declared);
      const ok =
        modified && writer.writeModified
          ? writer.writeModified(view)
          : writer.writeFull(view);
      return ok ? SEND_OK : SEND_FAILED;
    } catch (err) {
      this.#logger.error(LOG_CONTEXT.WRITER, "Payload writer threw", err);
      return SEND_FAILED;
    }
  }
}

/**
 * The slot shared by every publisher in this isolate.
 */
export const activeWriterSlot = new ActiveWriterSlot();

/**
 * Writer callbacks handed to the transport. They only ever reach the writer that is
 * currently in the slot; a transport calling them after the send returned gets
 * a failure and a zero size.
 */
export const writerBridge: TransportPayloadWriter = Object.freeze({
  writeFull: (buffer: Uint8Array, size: number) =>
    activeWriterSlot.write(buffer, size, false),
  writeModified: (buffer: Uint8Array, size: number) =>
    activeWriterSlot.write(buffer, size, true),
  getSize: () => activeWriterSlot.size(),
});
