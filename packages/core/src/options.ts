// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { ConfigurationError } from "./errors.js";
import type { LoggerAdapter } from "./logger.js";

/**
 * Options shared by every endpoint
 */
export interface EndpointOptions {
  /**
   * Optional observability sink. Never logs by default.
   */
  logger?: LoggerAdapter;
}

/**
 * Reject unknown option keys.
 * Unknown keys are always rejected (no silent ignoring), so typos surface at
 * construction time.
 */
export function validateOptionKeys(
  options: object,
  allowed: readonly string[],
  owner: string,
): void {
  for (const key of Object.keys(options)) {
    if (!allowed.includes(key)) {
      throw new ConfigurationError(
        `Unknown ${owner} option "${key}". Allowed options: ${allowed.join(", ")}`,
      );
    }
  }
}

/**
 * Throws ConfigurationError unless `value` is an integer in [min, max].
 */
export function validateIntegerOption(
  name: string,
  value: number,
  min: number,
  max: number = Number.POSITIVE_INFINITY,
): void {
  const integral = Number.isInteger(value) || value === Number.POSITIVE_INFINITY;
  if (!integral || value < min || value > max) {
    throw new ConfigurationError(
      `Option "${name}" must be an integer between ${min} and ${max}, got ${value}`,
    );
  }
}

const ENDPOINT_OPTION_KEYS = ["logger"] as const;

export function validateEndpointOptions(
  options: EndpointOptions,
  owner: string,
  extraKeys: readonly string[] = [],
): void {
  validateOptionKeys(options, [...ENDPOINT_OPTION_KEYS, ...extraKeys], owner);
}
