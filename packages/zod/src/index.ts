// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @ferry/zod - Zod payload validation for Ferry formats
 *
 * @example
 * ```typescript
 * import { createTypedPublisher } from "@ferry/core";
 * import { z, zodJson } from "@ferry/zod";
 *
 * const Simple = z.object({ message: z.string(), count: z.number() });
 * const publisher = createTypedPublisher(transport, "simple", zodJson(Simple));
 * ```
 */

// Canonical Zod instance (single import source)
export { z } from "zod";

export { zodJson, zodValidator } from "./validator.js";
export type { ZodJsonOptions, ZodValidatorOptions } from "./validator.js";
