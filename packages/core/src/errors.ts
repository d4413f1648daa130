// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Unified error code type for publishers, subscribers and formats
 */
export type FerryErrorCode =
  | "CREATE_FAILED"
  | "INVALID_NAME"
  | "CONFIGURATION_ERROR"
  | "SERIALIZATION_ERROR"
  | "DESERIALIZATION_ERROR"
  | "ENDPOINT_DESTROYED";

/**
 * Base error class for all Ferry endpoints.
 *
 * Only construction and encoding paths throw. Per-message sends report `false`,
 * and receive-side failures never leave the delivery trampoline.
 */
export class FerryError extends Error {
  /**
   * Error code for programmatic handling
   */
  declare readonly code: FerryErrorCode;

  /**
   * Whether retrying the same operation may succeed
   * - true: the transport ran out of a resource; retry later
   * - false: the input itself is invalid
   */
  retryable: boolean;

  /**
   * Original error that caused this, if any
   */
  override cause?: unknown;

  /**
   * Topic name involved, if applicable
   */
  topic?: string | undefined;

  constructor(
    message: string,
    options?: {
      code?: FerryErrorCode;
      retryable?: boolean;
      cause?: unknown;
      topic?: string;
    },
  ) {
    super(message);
    this.name = "FerryError";
    this.code = options?.code ?? "CREATE_FAILED";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.topic = options?.topic;
    Object.setPrototypeOf(this, FerryError.prototype);
  }
}

/**
 * The transport refused to create an endpoint handle
 */
export class CreateError extends FerryError {
  declare readonly code: "CREATE_FAILED";

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      topic?: string;
    },
  ) {
    super(message, { code: "CREATE_FAILED", retryable: true, ...options });
    this.name = "CreateError";
    Object.setPrototypeOf(this, CreateError.prototype);
  }
}

/**
 * A topic name, encoding or type name the transport cannot represent
 */
export class InvalidNameError extends FerryError {
  declare readonly code: "INVALID_NAME";

  constructor(
    message: string,
    options?: {
      topic?: string;
    },
  ) {
    super(message, { code: "INVALID_NAME", retryable: false, ...options });
    this.name = "InvalidNameError";
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

/**
 * Invalid options passed to an endpoint or transport
 */
export class ConfigurationError extends FerryError {
  declare readonly code: "CONFIGURATION_ERROR";

  constructor(
    message: string,
    options?: {
      cause?: unknown;
    },
  ) {
    super(message, {
      code: "CONFIGURATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A well-formed message could not be encoded (programming error)
 */
export class SerializationError extends FerryError {
  declare readonly code: "SERIALIZATION_ERROR";

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      topic?: string;
    },
  ) {
    super(message, {
      code: "SERIALIZATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "SerializationError";
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Payload bytes could not be decoded.
 *
 * Formats never throw this for untrusted input; it is what `onDrop` observers and
 * debug logs carry as the cause of a dropped delivery.
 */
export class DeserializationError extends FerryError {
  declare readonly code: "DESERIALIZATION_ERROR";

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      topic?: string;
    },
  ) {
    super(message, {
      code: "DESERIALIZATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "DeserializationError";
    Object.setPrototypeOf(this, DeserializationError.prototype);
  }
}

/**
 * Operation on an endpoint whose handle has already been released
 */
export class EndpointDestroyedError extends FerryError {
  declare readonly code: "ENDPOINT_DESTROYED";

  constructor(message: string, options?: { topic?: string }) {
    super(message, {
      code: "ENDPOINT_DESTROYED",
      retryable: false,
      ...options,
    });
    this.name = "EndpointDestroyedError";
    Object.setPrototypeOf(this, EndpointDestroyedError.prototype);
  }
}
