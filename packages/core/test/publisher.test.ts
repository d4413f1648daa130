// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it, vi } from "vitest";
import {
  CreateError,
  InvalidNameError,
  Publisher,
  SEND_FAILED,
  Timestamp,
  activeWriterSlot,
  createDataTypeInfo,
  createLogger,
  noopLogger,
  type PayloadWriter,
} from "../src/index.js";
import { FakeTransport } from "./fake-transport.js";

const RAW = createDataTypeInfo("raw", "bytes");

function fill(size: number, byte: number): PayloadWriter {
  return {
    getSize: () => size,
    writeFull(buffer) {
      buffer.fill(byte);
      return true;
    },
  };
}

describe("Publisher", () => {
  describe("construction", () => {
    it("creates one handle with a copy of the data type", () => {
      const transport = new FakeTransport();
      const descriptor = new Uint8Array([1, 2, 3]);

      const publisher = new Publisher(
        transport,
        "t",
        createDataTypeInfo("proto", "pkg.Msg", descriptor),
      );
      descriptor[0] = 9;

      expect(transport.calls).toEqual(["publisher.create t"]);
      expect(publisher.rawHandle).toBe(1);
      expect(
        Array.from(transport.publishers.get(1)?.dataType.descriptor ?? []),
      ).toEqual([1, 2, 3]);
    });

    it("throws CreateError when the transport refuses", () => {
      const transport = new FakeTransport();
      transport.failCreate = true;

      expect(() => new Publisher(transport, "t", RAW)).toThrow(CreateError);
      expect(() => new Publisher(transport, "t", RAW)).toThrow(
        'Failed to create publisher for topic "t"',
      );
    });

    it("rejects invalid names before touching the transport", () => {
      const transport = new FakeTransport();

      expect(() => new Publisher(transport, "", RAW)).toThrow(
        InvalidNameError,
      );
      expect(() => new Publisher(transport, "a\0b", RAW)).toThrow(
        InvalidNameError,
      );
      expect(
        () => new Publisher(transport, "t", createDataTypeInfo("raw\0", "x")),
      ).toThrow(InvalidNameError);
      expect(transport.calls).toEqual([]);
    });

    it("rejects unknown options", () => {
      const transport = new FakeTransport();
      const options = { logger: noopLogger, retries: 3 };

      expect(() => new Publisher(transport, "t", RAW, options)).toThrow(
        'Unknown publisher option "retries". Allowed options: logger',
      );
    });
  });

  describe("send", () => {
    it("hands the bytes to the transport with an auto timestamp", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.send(new Uint8Array([1, 2]))).toBe(true);
      expect(transport.sent).toEqual([{ bytes: [1, 2], timestamp: undefined }]);
    });

    it("passes a custom timestamp through", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      publisher.send(new Uint8Array([1]), Timestamp.custom(1_700_000_000_000_000));
      expect(transport.sent[0]?.timestamp).toBe(1_700_000_000_000_000);
    });

    it("rejects a custom timestamp that is not an integer", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.send(new Uint8Array([1]), Timestamp.custom(1.5))).toBe(
        false,
      );
      expect(transport.sent).toEqual([]);
    });

    it("reports transport failure as false", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.sendStatus = SEND_FAILED;

      expect(publisher.send(new Uint8Array([1]))).toBe(false);
    });

    it("sends an empty payload", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.send(new Uint8Array(0))).toBe(true);
      expect(transport.sent).toEqual([{ bytes: [], timestamp: undefined }]);
    });
  });

  describe("sendPayloadWriter", () => {
    it("lets writeFull fill the transport buffer", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.sendPayloadWriter(fill(4, 0x2a))).toBe(true);
      expect(transport.written).toEqual([0x2a, 0x2a, 0x2a, 0x2a]);
      expect(activeWriterSlot.current).toBeUndefined();
    });

    it("uses writeModified when the transport reuses a buffer", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.writeMode = "modified";

      const ok = publisher.sendPayloadWriter({
        getSize: () => 3,
        writeFull: () => false,
        writeModified(buffer) {
          buffer[0] = 1;
          return true;
        },
      });
      expect(ok).toBe(true);
      expect(transport.written).toEqual([1, 0x11, 0x11]);
    });

    it("falls back to writeFull when writeModified is absent", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.writeMode = "modified";

      expect(publisher.sendPayloadWriter(fill(2, 0x2a))).toBe(true);
      expect(transport.written).toEqual([0x2a, 0x2a]);
    });

    it("hands the writer exactly its declared size", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.slack = 4;
      const lengths: number[] = [];

      publisher.sendPayloadWriter({
        getSize: () => 2,
        writeFull(buffer) {
          lengths.push(buffer.length);
          buffer.fill(0x2a);
          return true;
        },
      });
      expect(lengths).toEqual([2]);
      expect(transport.written).toEqual([0x2a, 0x2a, 0, 0, 0, 0]);
    });

    it("fails when the writer reports failure", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      const ok = publisher.sendPayloadWriter({
        getSize: () => 1,
        writeFull: () => false,
      });
      expect(ok).toBe(false);
      expect(activeWriterSlot.current).toBeUndefined();
    });

    it("fails and logs when the writer throws", () => {
      const transport = new FakeTransport();
      const log = vi.fn();
      const publisher = new Publisher(transport, "t", RAW, {
        logger: createLogger({ log, minLevel: "error" }),
      });

      const ok = publisher.sendPayloadWriter({
        getSize: () => 1,
        writeFull() {
          throw new Error("disk on fire");
        },
      });
      expect(ok).toBe(false);
      expect(log).toHaveBeenCalledWith(
        "error",
        "writer",
        "Payload writer threw",
        expect.any(Error),
      );
      expect(activeWriterSlot.current).toBeUndefined();
    });

    it("fails when the declared size is invalid", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.sendPayloadWriter(fill(1.5, 0))).toBe(false);
    });

    it("fails when the transport rejects the send", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.sendStatus = SEND_FAILED;

      expect(publisher.sendPayloadWriter(fill(1, 0))).toBe(false);
    });

    it("rejects a zero-copy send nested inside another", () => {
      const transport = new FakeTransport();
      const outer = new Publisher(transport, "t", RAW);
      const log = vi.fn();
      const inner = new Publisher(transport, "u", RAW, {
        logger: createLogger({ log, minLevel: "warn" }),
      });
      const nested: boolean[] = [];
      transport.duringSend = () => {
        nested.push(inner.sendPayloadWriter(fill(1, 0)));
      };

      expect(outer.sendPayloadWriter(fill(1, 0))).toBe(true);
      expect(nested).toEqual([false]);
      expect(log).toHaveBeenCalledWith(
        "warn",
        "writer",
        "Nested zero-copy send rejected; a writer is already active",
        { topic: "u" },
      );
    });

    it("allows a copy send while a zero-copy send is in progress", () => {
      const transport = new FakeTransport();
      const outer = new Publisher(transport, "t", RAW);
      const inner = new Publisher(transport, "u", RAW);
      const nested: boolean[] = [];
      transport.duringSend = () => {
        nested.push(inner.send(new Uint8Array([5])));
      };

      expect(outer.sendPayloadWriter(fill(1, 0))).toBe(true);
      expect(nested).toEqual([true]);
    });
  });

  describe("queries and teardown", () => {
    it("answers metadata queries from the transport", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      expect(publisher.getTopicName()).toBe("t");
      expect(publisher.getSubscriberCount()).toBe(0);
      expect(publisher.getTopicId()).toEqual({
        entityId: "1",
        processId: 1,
        hostName: "test-host",
        topicName: "t",
      });
      expect(publisher.getDataTypeInformation()?.typeName).toBe("bytes");
    });

    it("returns a data type copy that writes cannot reach", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(
        transport,
        "t",
        createDataTypeInfo("proto", "pkg.Msg", new Uint8Array([1, 2, 3])),
      );

      const info = publisher.getDataTypeInformation();
      if (info) info.descriptor[0] = 99;

      expect(
        Array.from(transport.publishers.get(1)?.dataType.descriptor ?? []),
      ).toEqual([1, 2, 3]);
      expect(Array.from(publisher.getDataTypeInformation()?.descriptor ?? [])).toEqual(
        [1, 2, 3],
      );
    });

    it("answers undefined when a query throws", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      transport.queryThrows = true;

      expect(publisher.getTopicName()).toBeUndefined();
      expect(publisher.getSubscriberCount()).toBeUndefined();
    });

    it("releases the handle once", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);

      publisher.destroy();
      publisher.destroy();

      expect(transport.calls).toEqual([
        "publisher.create t",
        "publisher.destroy 1",
      ]);
      expect(publisher.destroyed).toBe(true);
      expect(publisher.rawHandle).toBeUndefined();
    });

    it("fails sends and queries after destroy", () => {
      const transport = new FakeTransport();
      const publisher = new Publisher(transport, "t", RAW);
      publisher.destroy();

      expect(publisher.send(new Uint8Array([1]))).toBe(false);
      expect(publisher.sendPayloadWriter(fill(1, 0))).toBe(false);
      expect(publisher.getTopicName()).toBeUndefined();
      expect(transport.sent).toEqual([]);
    });
  });
});
