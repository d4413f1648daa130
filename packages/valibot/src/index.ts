// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @ferry/valibot - Valibot payload validation for Ferry formats
 */

export { valibotJson, valibotValidator } from "./validator.js";
export type {
  ValibotJsonOptions,
  ValibotValidatorOptions,
} from "./validator.js";
