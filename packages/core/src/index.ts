// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @ferry/core - typed publish/subscribe over a zero-copy topic transport
 *
 * ## Semantics
 *
 * - **Publish**: synchronous on the caller's turn; `false` on failure, no retry
 * - **Zero-copy**: `sendPayloadWriter()` lets the writer fill transport memory in place
 * - **Subscribe**: callback driven; one subscriber's deliveries never overlap
 * - **Malformed payloads**: dropped at the trampoline, never thrown
 *
 * ## Example
 *
 * ```typescript
 * import { createTypedPublisher, createTypedSubscriber, stringFormat } from "@ferry/core";
 * import { memoryTransport } from "@ferry/memory";
 *
 * const transport = memoryTransport();
 * const subscriber = createTypedSubscriber(transport, "hello", stringFormat());
 * subscriber.setCallback(({ payload }) => console.log(payload));
 *
 * const publisher = createTypedPublisher(transport, "hello", stringFormat());
 * publisher.send("Hello!");
 * ```
 */

export { Publisher } from "./publisher.js";
export { Subscriber } from "./subscriber.js";
export { TypedPublisher, createTypedPublisher } from "./typed-publisher.js";
export {
  TypedSubscriber,
  createTypedSubscriber,
} from "./typed-subscriber.js";
export type {
  DropInfo,
  SubscriberState,
  TypedSubscriberOptions,
} from "./typed-subscriber.js";

export {
  ActiveWriterSlot,
  activeWriterSlot,
  writerBridge,
} from "./payload-writer.js";
export type { PayloadWriter } from "./payload-writer.js";

export { SEND_FAILED, SEND_OK } from "./transport.js";
export type {
  ReceiveCallback,
  SendStatus,
  Transport,
  TransportHandle,
  TransportPayloadWriter,
  TransportPublisherApi,
  TransportSubscriberApi,
} from "./transport.js";

export { Timestamp } from "./types.js";
export type {
  DataTypeInfo,
  ReceiveCallbackData,
  ReceiveHandler,
  Received,
  TopicId,
} from "./types.js";

export {
  EMPTY_DATA_TYPE,
  assertEndpointNames,
  assertTransportString,
  copyDataTypeInfo,
  createDataTypeInfo,
  dataTypeEquals,
} from "./data-type.js";

export { anyValidator } from "./format.js";
export type {
  MessageFormat,
  ParseResult,
  PayloadValidator,
  ReceiveMode,
} from "./format.js";

export {
  BYTES_TYPE_NAME,
  RAW_ENCODING,
  bytesFormat,
  bytesWriter,
} from "./formats/bytes.js";
export type { BytesFormatOptions } from "./formats/bytes.js";
export {
  STRING_ENCODING,
  STRING_TYPE_NAME,
  stringFormat,
} from "./formats/string.js";

export {
  validateEndpointOptions,
  validateIntegerOption,
  validateOptionKeys,
} from "./options.js";
export type { EndpointOptions } from "./options.js";

export {
  DefaultLoggerAdapter,
  LOG_CONTEXT,
  createLogger,
  noopLogger,
} from "./logger.js";
export type { LogLevel, LoggerAdapter, LoggerOptions } from "./logger.js";

export {
  ConfigurationError,
  CreateError,
  DeserializationError,
  EndpointDestroyedError,
  FerryError,
  InvalidNameError,
  SerializationError,
} from "./errors.js";
export type { FerryErrorCode } from "./errors.js";
