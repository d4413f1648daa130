// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it, vi } from "vitest";
import {
  SerializationError,
  bytesFormat,
  bytesWriter,
  createDataTypeInfo,
  createTypedPublisher,
  stringFormat,
  type MessageFormat,
} from "../src/index.js";
import { FakeTransport } from "./fake-transport.js";

describe("TypedPublisher", () => {
  it("binds the format's data type to the handle", () => {
    const transport = new FakeTransport();

    createTypedPublisher(transport, "t", stringFormat());

    const info = transport.publishers.get(1)?.dataType;
    expect(info?.encoding).toBe("utf-8");
    expect(info?.typeName).toBe("string");
  });

  it("encodes through the format", () => {
    const transport = new FakeTransport();
    const publisher = createTypedPublisher(transport, "t", stringFormat());

    expect(publisher.send("hi")).toBe(true);
    expect(transport.sent).toEqual([{ bytes: [104, 105], timestamp: undefined }]);
  });

  it("skips encoding once destroyed", () => {
    const transport = new FakeTransport();
    const encode = vi.fn(() => new Uint8Array(0));
    const format: MessageFormat<string> = {
      encoding: "custom",
      dataType: () => createDataTypeInfo("custom", "s"),
      encode,
      decode: () => undefined,
    };
    const publisher = createTypedPublisher(transport, "t", format);

    publisher.destroy();

    expect(publisher.destroyed).toBe(true);
    expect(publisher.send("hi")).toBe(false);
    expect(encode).not.toHaveBeenCalled();
  });

  it("lets a SerializationError from the format propagate", () => {
    const transport = new FakeTransport();
    const format: MessageFormat<string> = {
      encoding: "custom",
      dataType: () => createDataTypeInfo("custom", "s"),
      encode() {
        throw new SerializationError("cannot encode");
      },
      decode: () => undefined,
    };
    const publisher = createTypedPublisher(transport, "t", format);

    expect(() => publisher.send("hi")).toThrow(SerializationError);
    expect(transport.sent).toEqual([]);
  });

  it("sends a payload writer without encoding", () => {
    const transport = new FakeTransport();
    const publisher = createTypedPublisher(transport, "t", bytesFormat());

    expect(publisher.sendPayloadWriter(bytesWriter(new Uint8Array([4, 5])))).toBe(
      true,
    );
    expect(transport.written).toEqual([4, 5]);
  });

  it("delegates metadata queries", () => {
    const transport = new FakeTransport();
    const publisher = createTypedPublisher(transport, "t", bytesFormat());

    expect(publisher.getTopicName()).toBe("t");
    expect(publisher.getSubscriberCount()).toBe(0);
    expect(publisher.getTopicId()?.entityId).toBe("1");
    expect(publisher.getDataTypeInformation()?.encoding).toBe("raw");
    expect(publisher.rawHandle).toBe(1);
  });
});
