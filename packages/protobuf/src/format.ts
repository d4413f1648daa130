// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Field, IConversionOptions, Type } from "protobufjs";
import {
  SerializationError,
  createDataTypeInfo,
  validateOptionKeys,
  type MessageFormat,
  type PayloadValidator,
} from "@ferry/core";

export const PROTO_ENCODING = "proto";

export type ProtoObject = Record<string, unknown>;

export interface ProtobufFormatOptions<T> {
  /**
   * Runs on the decoded plain object; decoded values it rejects are dropped.
   */
  validator?: PayloadValidator<T>;
}

// Plain objects that survive a JSON round trip and re-encode through fromObject().
const CONVERSION: IConversionOptions = {
  longs: String,
  enums: String,
  defaults: true,
};

const encoder = new TextEncoder();
const descriptors = new WeakMap<object, Uint8Array>();

/**
 * protobufjs JSON of the type's root, UTF-8 encoded. Computed once per root.
 */
function rootDescriptor(type: Type): Uint8Array {
  const root = type.root;
  let descriptor = descriptors.get(root);
  if (!descriptor) {
    descriptor = encoder.encode(JSON.stringify(root.toJSON()));
    descriptors.set(root, descriptor);
  }
  return descriptor;
}

const INTEGER = /^-?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

function isObject(value: unknown): value is ProtoObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLongString(field: Field, value: string): boolean {
  if (!INTEGER.test(value)) return false;
  const n = BigInt(value);
  return field.type === "uint64" || field.type === "fixed64"
    ? n >= 0n && n <= UINT64_MAX
    : n >= INT64_MIN && n <= INT64_MAX;
}

function verifiableValue(field: Field, value: unknown): unknown {
  const resolved = field.resolve().resolvedType;
  if (resolved === null) {
    // verify() takes numbers or Long objects; fromObject() parses the string exactly.
    return field.long && typeof value === "string" && isLongString(field, value)
      ? 0
      : value;
  }
  if ("values" in resolved) {
    if (typeof value !== "string") return value;
    const number = Object.hasOwn(resolved.values, value)
      ? resolved.values[value]
      : undefined;
    return number ?? value;
  }
  return isObject(value) ? verifiable(resolved, value) : value;
}

/**
 * Copy of `value` in the shape verify() checks: enum names become their numbers
 * and decimal strings in 64-bit fields become numbers. Anything else is left for
 * verify() to report.
 */
function verifiable(type: Type, value: ProtoObject): ProtoObject {
  const out: ProtoObject = { ...value };
  for (const field of type.fieldsArray) {
    const current = value[field.name];
    if (current === undefined || current === null) continue;
    if (field.map) {
      out[field.name] = isObject(current)
        ? Object.fromEntries(
            Object.entries(current).map(([key, item]) => [
              key,
              verifiableValue(field, item),
            ]),
          )
        : current;
    } else if (field.repeated) {
      out[field.name] = Array.isArray(current)
        ? current.map((item: unknown) => verifiableValue(field, item))
        : current;
    } else {
      out[field.name] = verifiableValue(field, current);
    }
  }
  return out;
}

function encodeWith(type: Type, value: ProtoObject): Uint8Array {
  const problem = type.verify(verifiable(type, value));
  if (problem !== null) {
    throw new SerializationError(
      `Invalid ${type.fullName.replace(/^\./, "")} message: ${problem}`,
    );
  }
  return type.encode(type.fromObject(value)).finish();
}

function decodeWith(type: Type, bytes: Uint8Array): ProtoObject | undefined {
  try {
    return type.toObject(type.decode(bytes), CONVERSION);
  } catch {
    return undefined;
  }
}

/**
 * Protobuf messages over protobufjs reflection.
 *
 * Values are plain objects in protobufjs' `toObject()` form: 64-bit integers and
 * enums as strings, absent fields filled with defaults. The type name is the
 * message's fully qualified name; the descriptor is the JSON of the root it was
 * loaded into.
 *
 * @example
 * ```typescript
 * const root = await protobuf.load("reading.proto");
 * const format = protobufFormat(root.lookupType("demo.Reading"));
 * ```
 */
export function protobufFormat(type: Type): MessageFormat<ProtoObject>;
export function protobufFormat<T extends ProtoObject>(
  type: Type,
  options: ProtobufFormatOptions<T> & { validator: PayloadValidator<T> },
): MessageFormat<T>;
export function protobufFormat<T extends ProtoObject>(
  type: Type,
  options: ProtobufFormatOptions<T> = {},
): MessageFormat<T> | MessageFormat<ProtoObject> {
  validateOptionKeys(options, ["validator"], "protobuf format");

  const dataType = createDataTypeInfo(
    PROTO_ENCODING,
    type.fullName.replace(/^\./, ""),
    rootDescriptor(type),
  );
  const { validator } = options;

  const base = {
    encoding: PROTO_ENCODING,
    // Decoded bytes fields may share memory with the input.
    receive: "copy",
    dataType: () => dataType,
  } as const;

  if (!validator) {
    const plain: MessageFormat<ProtoObject> = {
      ...base,
      encode: (value) => encodeWith(type, value),
      decode: (bytes) => decodeWith(type, bytes),
    };
    return plain;
  }

  const validated: MessageFormat<T> = {
    ...base,
    encode: (value) => encodeWith(type, value),
    decode(bytes) {
      const decoded = decodeWith(type, bytes);
      if (decoded === undefined) return undefined;
      const result = validator.safeParse(decoded);
      return result.success ? result.data : undefined;
    },
  };
  return validated;
}
