// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import * as v from "valibot";
import {
  validateOptionKeys,
  type MessageFormat,
  type PayloadValidator,
} from "@ferry/core";
import { jsonFormat, type SerdeFormatOptions } from "@ferry/serde";

export interface ValibotValidatorOptions {
  /** Declared type name */
  typeName?: string;
}

export type ValibotJsonOptions = ValibotValidatorOptions & SerdeFormatOptions;

// Root errors first, then one line per nested field.
function formatIssues(issues: [v.BaseIssue<unknown>, ...v.BaseIssue<unknown>[]]): string {
  const flattened = v.flatten(issues);
  const errors: string[] = [];

  if (flattened.root) {
    errors.push(...flattened.root);
  }

  if (flattened.nested) {
    for (const [field, fieldErrors] of Object.entries(flattened.nested)) {
      if (fieldErrors) {
        errors.push(...fieldErrors.map((err) => `${field}: ${err}`));
      }
    }
  }

  return errors.length > 0 ? errors.join("\n") : "Validation failed";
}

/**
 * PayloadValidator backed by a Valibot schema. Parsed values are the schema's output.
 *
 * Valibot schemas carry no portable schema form, so the descriptor stays empty.
 */
export function valibotValidator<
  S extends v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>,
>(schema: S, options: ValibotValidatorOptions = {}): PayloadValidator<v.InferOutput<S>> {
  validateOptionKeys(options, ["typeName"], "valibot validator");

  return {
    typeName: options.typeName,
    safeParse(value) {
      const result = v.safeParse(schema, value);
      if (result.success) return { success: true, data: result.output };
      return { success: false, error: formatIssues(result.issues) };
    },
  };
}

/**
 * JSON format validated by `schema`: `jsonFormat(valibotValidator(schema))`.
 *
 * @example
 * ```typescript
 * import * as v from "valibot";
 *
 * const Simple = v.object({ message: v.string(), count: v.number() });
 * const subscriber = createTypedSubscriber(transport, "simple", valibotJson(Simple));
 * ```
 */
export function valibotJson<
  S extends v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>,
>(schema: S, options: ValibotJsonOptions = {}): MessageFormat<v.InferOutput<S>> {
  const { typeName, ...formatOptions } = options;
  return jsonFormat(
    valibotValidator(schema, typeName !== undefined ? { typeName } : {}),
    formatOptions,
  );
}
