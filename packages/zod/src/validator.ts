// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { z } from "zod";
import {
  ConfigurationError,
  validateOptionKeys,
  type MessageFormat,
  type PayloadValidator,
} from "@ferry/core";
import { jsonFormat, type SerdeFormatOptions } from "@ferry/serde";

export interface ZodValidatorOptions {
  /**
   * Declared type name. Defaults to the schema's registered `id`, then its `title`
   * (see `schema.meta()`).
   */
  typeName?: string;

  /**
   * Attach the schema's JSON Schema as the descriptor (default: true).
   */
  descriptor?: boolean;
}

export type ZodJsonOptions = ZodValidatorOptions & SerdeFormatOptions;

const VALIDATOR_KEYS = ["typeName", "descriptor"] as const;

const encoder = new TextEncoder();

function jsonSchemaDescriptor(schema: z.ZodType): Uint8Array {
  try {
    const jsonSchema = z.toJSONSchema(schema, { unrepresentable: "any" });
    return encoder.encode(JSON.stringify(jsonSchema));
  } catch (err) {
    throw new ConfigurationError(
      'Schema has no JSON Schema form; pass { descriptor: false }',
      { cause: err },
    );
  }
}

/**
 * PayloadValidator backed by a Zod schema.
 *
 * Parsed values are the schema's output, so transforms and defaults apply on
 * receive. Failures carry `z.prettifyError()` text.
 *
 * @example
 * ```typescript
 * import { jsonFormat } from "@ferry/serde";
 * import { z, zodValidator } from "@ferry/zod";
 *
 * const Simple = z.object({ message: z.string(), count: z.number() }).meta({ id: "Simple" });
 * const format = jsonFormat(zodValidator(Simple));
 * ```
 */
export function zodValidator<S extends z.ZodType>(
  schema: S,
  options: ZodValidatorOptions = {},
): PayloadValidator<z.output<S>> {
  validateOptionKeys(options, VALIDATOR_KEYS, "zod validator");

  const meta = z.globalRegistry.get(schema);
  const typeName = options.typeName ?? meta?.id ?? meta?.title;
  const descriptor =
    options.descriptor === false ? undefined : jsonSchemaDescriptor(schema);

  return {
    typeName,
    descriptor,
    safeParse(value) {
      const result = schema.safeParse(value);
      if (result.success) return { success: true, data: result.data };
      return { success: false, error: z.prettifyError(result.error) };
    },
  };
}

/**
 * JSON format validated by `schema`: `jsonFormat(zodValidator(schema))`.
 */
export function zodJson<S extends z.ZodType>(
  schema: S,
  options: ZodJsonOptions = {},
): MessageFormat<z.output<S>> {
  const { typeName, descriptor, ...formatOptions } = options;
  return jsonFormat(
    zodValidator(schema, {
      ...(typeName !== undefined ? { typeName } : {}),
      ...(descriptor !== undefined ? { descriptor } : {}),
    }),
    formatOptions,
  );
}
