// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  ActiveWriterSlot,
  SEND_FAILED,
  SEND_OK,
  writerBridge,
  type PayloadWriter,
} from "../src/index.js";

function writer(size: number, byte = 0x2a): PayloadWriter {
  return {
    getSize: () => size,
    writeFull(buffer) {
      buffer.fill(byte);
      return true;
    },
  };
}

describe("ActiveWriterSlot", () => {
  it("holds one writer at a time", () => {
    const slot = new ActiveWriterSlot();
    const first = writer(1);

    expect(slot.occupy(first)).toBe(true);
    expect(slot.occupy(writer(2))).toBe(false);
    expect(slot.current).toBe(first);

    slot.release();
    expect(slot.current).toBeUndefined();
    expect(slot.occupy(writer(2))).toBe(true);
  });

  it("fails writes while empty", () => {
    const slot = new ActiveWriterSlot();

    expect(slot.write(new Uint8Array(1), 1, false)).toBe(SEND_FAILED);
    expect(slot.size()).toBe(0);
  });

  it("fails when the buffer is shorter than the declared size", () => {
    const slot = new ActiveWriterSlot();
    slot.occupy(writer(4));

    expect(slot.write(new Uint8Array(2), 2, false)).toBe(SEND_FAILED);
    expect(slot.failed).toBe(true);
  });

  it("uses the smaller of size and buffer length", () => {
    const slot = new ActiveWriterSlot();
    slot.occupy(writer(4));

    expect(slot.write(new Uint8Array(8), 3, false)).toBe(SEND_FAILED);
    expect(slot.write(new Uint8Array(3), 8, false)).toBe(SEND_FAILED);
  });

  it("records a failed size query", () => {
    const slot = new ActiveWriterSlot();
    slot.occupy({
      getSize() {
        throw new Error("no size");
      },
      writeFull: () => true,
    });

    expect(slot.size()).toBe(0);
    expect(slot.failed).toBe(true);
  });

  it("clears the failure flag on release", () => {
    const slot = new ActiveWriterSlot();
    slot.occupy(writer(1.5));
    slot.size();
    expect(slot.failed).toBe(true);

    slot.release();
    expect(slot.failed).toBe(false);
  });

  it("writes through writeModified when present", () => {
    const slot = new ActiveWriterSlot();
    const buffer = new Uint8Array([7, 7]);
    slot.occupy({
      getSize: () => 2,
      writeFull: () => false,
      writeModified(view) {
        view[1] = 8;
        return true;
      },
    });

    expect(slot.write(buffer, 2, true)).toBe(SEND_OK);
    expect(Array.from(buffer)).toEqual([7, 8]);
    expect(slot.failed).toBe(false);
  });
});

describe("writerBridge", () => {
  it("reports failure and a zero size outside of a send", () => {
    expect(writerBridge.getSize()).toBe(0);
    expect(writerBridge.writeFull(new Uint8Array(4), 4)).toBe(SEND_FAILED);
    expect(writerBridge.writeModified(new Uint8Array(4), 4)).toBe(SEND_FAILED);
  });
});
