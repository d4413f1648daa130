// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  EMPTY_DATA_TYPE,
  SerializationError,
  type PayloadValidator,
} from "@ferry/core";
import { describe, expect, it } from "vitest";
import { cborFormat } from "./cbor.js";
import { jsonFormat } from "./json.js";
import { msgpackFormat } from "./msgpack.js";

interface Simple {
  message: string;
  count: number;
}

function isSimple(value: unknown): value is Simple {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string" &&
    "count" in value &&
    typeof value.count === "number" &&
    value.count >= 0
  );
}

const simple: PayloadValidator<Simple> = {
  typeName: "app::nested::Simple",
  descriptor: new Uint8Array([7]),
  safeParse: (value) =>
    isSimple(value)
      ? { success: true, data: value }
      : { success: false, error: "not a Simple" },
};

const text = new TextEncoder();

describe("jsonFormat", () => {
  it("describes itself", () => {
    const format = jsonFormat();
    const info = format.dataType();

    expect(format.encoding).toBe("json");
    expect(format.receive).toBe("borrow");
    expect(info.typeName).toBe("");
    expect(info.descriptor.length).toBe(0);
  });

  it("takes type name and descriptor from the validator", () => {
    const info = jsonFormat(simple).dataType();

    expect(info.typeName).toBe("Simple");
    expect(Array.from(info.descriptor)).toEqual([7]);
    expect(jsonFormat(simple, { typeName: "pkg.Other" }).dataType().typeName).toBe(
      "Other",
    );
    expect(jsonFormat({ typeName: "pkg.Loose" }).dataType().typeName).toBe("Loose");
  });

  it("encodes UTF-8 JSON", () => {
    const bytes = jsonFormat(simple).encode({ message: "hi", count: 1 });

    expect(new TextDecoder().decode(bytes)).toBe('{"message":"hi","count":1}');
  });

  it("decodes values the validator accepts", () => {
    const format = jsonFormat(simple);

    expect(
      format.decode(text.encode('{"message":"hi","count":1}'), EMPTY_DATA_TYPE),
    ).toEqual({ message: "hi", count: 1 });
  });

  it("drops values the validator rejects", () => {
    const format = jsonFormat(simple);

    expect(
      format.decode(text.encode('{"message":"hi"}'), EMPTY_DATA_TYPE),
    ).toBeUndefined();
  });

  it("drops corrupt bytes", () => {
    const format = jsonFormat();

    expect(format.decode(new Uint8Array([1, 2, 3]), EMPTY_DATA_TYPE)).toBeUndefined();
    expect(format.decode(new Uint8Array([0xff]), EMPTY_DATA_TYPE)).toBeUndefined();
    expect(format.decode(new Uint8Array(0), EMPTY_DATA_TYPE)).toBeUndefined();
  });

  it("validates outgoing values on request", () => {
    const strict = jsonFormat(simple, { validateOutgoing: true });

    expect(() => strict.encode({ message: "x", count: -1 })).toThrow(
      "Outgoing json message failed validation: not a Simple",
    );
    expect(jsonFormat(simple).encode({ message: "x", count: -1 }).length).toBe(
      26,
    );
  });

  it("throws SerializationError for values JSON cannot hold", () => {
    const format = jsonFormat();

    expect(() => format.encode(10n)).toThrow("Failed to encode json message");
    expect(() => format.encode(undefined)).toThrow(
      "Value of type undefined has no JSON representation",
    );
  });

  it("rejects unknown options", () => {
    const options = { typeName: "x", strict: true };

    expect(() => jsonFormat(options)).toThrow(
      'Unknown json format option "strict". Allowed options: typeName, validateOutgoing',
    );
  });
});

describe("cborFormat", () => {
  it("round-trips plain data", () => {
    const format = cborFormat();
    const value = {
      message: "hi",
      count: -3,
      ratio: 1.5,
      tags: ["a", "b"],
      nested: { ok: true, none: null },
      blob: new Uint8Array([1, 2]),
    };

    expect(format.decode(format.encode(value), EMPTY_DATA_TYPE)).toEqual(value);
  });

  it("decodes standard CBOR maps into objects", () => {
    const format = cborFormat();

    expect(
      format.decode(new Uint8Array([0xa1, 0x61, 0x61, 0x01]), EMPTY_DATA_TYPE),
    ).toEqual({ a: 1 });
  });

  it("follows JSON rules for undefined", () => {
    const format = cborFormat();
    const bytes = format.encode({ a: 1, b: undefined, list: [undefined] });

    expect(format.decode(bytes, EMPTY_DATA_TYPE)).toEqual({ a: 1, list: [null] });
  });

  it("throws SerializationError for values CBOR cannot hold", () => {
    const format = cborFormat();

    expect(() => format.encode(new Date(0))).toThrow(
      "Date instances have no CBOR representation",
    );
    expect(() => format.encode(() => 1)).toThrow(SerializationError);
  });

  it("drops truncated input and validator rejections", () => {
    const format = cborFormat(simple);

    expect(format.decode(new Uint8Array([0xa1]), EMPTY_DATA_TYPE)).toBeUndefined();
    expect(
      format.decode(cborFormat().encode({ message: 1 }), EMPTY_DATA_TYPE),
    ).toBeUndefined();
    expect(format.dataType()).toMatchObject({
      encoding: "cbor",
      typeName: "Simple",
    });
    expect(format.receive).toBe("copy");
  });
});

describe("msgpackFormat", () => {
  it("encodes MessagePack", () => {
    expect(Array.from(msgpackFormat().encode({ a: 1 }))).toEqual([
      0x81, 0xa1, 0x61, 0x01,
    ]);
  });

  it("round-trips through the validator", () => {
    const format = msgpackFormat(simple);
    const value = { message: "hi", count: 1 };

    expect(format.decode(format.encode(value), EMPTY_DATA_TYPE)).toEqual(value);
    expect(format.dataType().encoding).toBe("msgpack");
  });

  it("drops corrupt bytes", () => {
    const format = msgpackFormat();

    expect(format.decode(new Uint8Array([0xc1]), EMPTY_DATA_TYPE)).toBeUndefined();
  });
});
