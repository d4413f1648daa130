// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { assertEndpointNames, copyDataTypeInfo } from "./data-type.js";
import { CreateError } from "./errors.js";
import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "./logger.js";
import { validateEndpointOptions, type EndpointOptions } from "./options.js";
import {
  activeWriterSlot,
  writerBridge,
  type PayloadWriter,
} from "./payload-writer.js";
import {
  SEND_OK,
  type Transport,
  type TransportHandle,
  type TransportPublisherApi,
} from "./transport.js";
import { Timestamp, type DataTypeInfo, type TopicId } from "./types.js";

/**
 * Untyped publisher: owns one transport publisher handle and sends raw bytes.
 *
 * ## Semantics
 *
 * - **Ownership**: exactly one handle, released once by `destroy()`
 * - **Metadata**: the DataTypeInfo is copied at construction and outlives the handle
 * - **Sends**: synchronous, no queue, no retry; failures are `false`, never thrown
 * - **Queries**: `undefined` when the transport cannot answer or after `destroy()`
 *
 * @example
 * ```typescript
 * const publisher = new Publisher(transport, "blob", bytesFormat().dataType());
 * publisher.send(new Uint8Array([1, 2, 3]));
 * publisher.send(payload, Timestamp.custom(1_700_000_000_000_000));
 * ```
 */
export class Publisher {
  readonly #api: TransportPublisherApi;
  readonly #dataType: DataTypeInfo;
  readonly #topicName: string;
  readonly #logger: LoggerAdapter;
  #handle: TransportHandle | undefined;

  constructor(
    transport: Transport,
    topicName: string,
    dataType: DataTypeInfo,
    options: EndpointOptions = {},
  ) {
    validateEndpointOptions(options, "publisher");
    assertEndpointNames(topicName, dataType);

    this.#api = transport.publisher;
    this.#dataType = copyDataTypeInfo(dataType);
    this.#topicName = topicName;
    this.#logger = options.logger ?? noopLogger;

    const handle = this.#api.create(topicName, this.#dataType);
    if (handle === undefined) {
      throw new CreateError(
        `Failed to create publisher for topic "${topicName}"`,
        { topic: topicName },
      );
    }
    this.#handle = handle;
    this.#logger.debug(LOG_CONTEXT.PUBLISHER, "Publisher created", {
      topic: topicName,
      encoding: this.#dataType.encoding,
      typeName: this.#dataType.typeName,
    });
  }

  /**
   * Transport handle, or undefined once destroyed.
   */
  get rawHandle(): TransportHandle | undefined {
    return this.#handle;
  }

  get destroyed(): boolean {
    return this.#handle === undefined;
  }

  /**
   * Copy `data` into a transport buffer and publish it.
   *
   * @returns true on success, false on failure
   */
  send(data: Uint8Array, timestamp: Timestamp = Timestamp.auto): boolean {
    const handle = this.#handle;
    if (handle === undefined) return false;

    const micros = this.#resolveTimestamp(timestamp);
    if (micros === null) return false;

    try {
      return this.#api.send(handle, data, micros) === SEND_OK;
    } catch (err) {
      this.#logger.error(LOG_CONTEXT.PUBLISHER, "Transport send threw", err);
      return false;
    }
  }

  /**
   * Zero-copy send: the transport allocates (or reuses) the buffer and `writer`
   * fills it in place, synchronously, before this returns.
   *
   * Fails when another zero-copy send on this thread is still in progress, when any
   * writer callback reports failure or when the transport rejects the send.
   */
  sendPayloadWriter(
    writer: PayloadWriter,
    timestamp: Timestamp = Timestamp.auto,
  ): boolean {
    const handle = this.#handle;
    if (handle === undefined) return false;

    const micros = this.#resolveTimestamp(timestamp);
    if (micros === null) return false;

    if (!activeWriterSlot.occupy(writer, this.#logger)) {
      this.#logger.warn(
        LOG_CONTEXT.WRITER,
        "Nested zero-copy send rejected; a writer is already active",
        { topic: this.#topicName },
      );
      return false;
    }

    try {
      const status = this.#api.sendPayloadWriter(handle, writerBridge, micros);
      return status === SEND_OK && !activeWriterSlot.failed;
    } catch (err) {
      this.#logger.error(
        LOG_CONTEXT.PUBLISHER,
        "Transport zero-copy send threw",
        err,
      );
      return false;
    } finally {
      activeWriterSlot.release();
    }
  }

  getSubscriberCount(): number | undefined {
    return this.#query((h) => this.#api.getSubscriberCount(h));
  }

  getTopicName(): string | undefined {
    return this.#query((h) => this.#api.getTopicName(h));
  }

  getTopicId(): TopicId | undefined {
    return this.#query((h) => this.#api.getTopicId(h));
  }

  /**
   * A private copy of the topic's DataTypeInfo; writing to it changes nothing.
   */
  getDataTypeInformation(): DataTypeInfo | undefined {
    const info = this.#query((h) => this.#api.getDataTypeInformation(h));
    return info && copyDataTypeInfo(info);
  }

  /**
   * Release the transport handle. Safe to call more than once.
   */
  destroy(): void {
    const handle = this.#handle;
    if (handle === undefined) return;
    this.#handle = undefined;
    this.#api.destroy(handle);
    this.#logger.debug(LOG_CONTEXT.PUBLISHER, "Publisher destroyed", {
      topic: this.#topicName,
    });
  }

  // null = invalid custom timestamp; undefined = let the transport decide
  #resolveTimestamp(timestamp: Timestamp): number | undefined | null {
    if (timestamp.kind === "auto") return undefined;
    if (!Number.isSafeInteger(timestamp.micros)) {
      this.#logger.warn(LOG_CONTEXT.PUBLISHER, "Invalid custom timestamp", {
        topic: this.#topicName,
        micros: timestamp.micros,
      });
      return null;
    }
    return timestamp.micros;
  }

  #query<R>(read: (handle: TransportHandle) => R | undefined): R | undefined {
    const handle = this.#handle;
    if (handle === undefined) return undefined;
    try {
      return read(handle);
    } catch (err) {
      this.#logger.warn(LOG_CONTEXT.PUBLISHER, "Metadata query failed", err);
      return undefined;
    }
  }
}
