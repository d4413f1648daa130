// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { assertEndpointNames, copyDataTypeInfo } from "./data-type.js";
import { CreateError, EndpointDestroyedError } from "./errors.js";
import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "./logger.js";
import { validateEndpointOptions, type EndpointOptions } from "./options.js";
import type {
  ReceiveCallback,
  Transport,
  TransportHandle,
  TransportSubscriberApi,
} from "./transport.js";
import type { DataTypeInfo, TopicId } from "./types.js";

/**
 * Untyped subscriber: owns one transport subscriber handle and one registered
 * delivery entry point.
 *
 * The entry point is fixed at construction. What changes over the subscriber's life
 * is the context threaded to it, swapped through `setContext()`. The transport
 * replaces entry point and context as one unit, so a delivery either runs against
 * the previous context or the new one, never a mix.
 */
export class Subscriber<C> {
  readonly #api: TransportSubscriberApi;
  readonly #entryPoint: ReceiveCallback<C>;
  readonly #dataType: DataTypeInfo;
  readonly #topicName: string;
  readonly #logger: LoggerAdapter;
  #handle: TransportHandle | undefined;

  constructor(
    transport: Transport,
    topicName: string,
    dataType: DataTypeInfo,
    entryPoint: ReceiveCallback<C>,
    context: C,
    options: EndpointOptions = {},
  ) {
    validateEndpointOptions(options, "subscriber");
    assertEndpointNames(topicName, dataType);

    this.#api = transport.subscriber;
    this.#entryPoint = entryPoint;
    this.#dataType = copyDataTypeInfo(dataType);
    this.#topicName = topicName;
    this.#logger = options.logger ?? noopLogger;

    const handle = this.#api.create(topicName, this.#dataType);
    if (handle === undefined) {
      throw new CreateError(
        `Failed to create subscriber for topic "${topicName}"`,
        { topic: topicName },
      );
    }

    if (!this.#api.setReceiveCallback(handle, entryPoint, context)) {
      this.#api.destroy(handle);
      throw new CreateError(
        `Failed to register receive callback for topic "${topicName}"`,
        { topic: topicName },
      );
    }

    this.#handle = handle;
    this.#logger.debug(LOG_CONTEXT.SUBSCRIBER, "Subscriber created", {
      topic: topicName,
      encoding: this.#dataType.encoding,
      typeName: this.#dataType.typeName,
    });
  }

  get rawHandle(): TransportHandle | undefined {
    return this.#handle;
  }

  get destroyed(): boolean {
    return this.#handle === undefined;
  }

  /**
   * Re-register the entry point with a new context.
   *
   * @throws EndpointDestroyedError after `destroy()`
   */
  setContext(context: C): void {
    const handle = this.#requireHandle();
    if (!this.#api.setReceiveCallback(handle, this.#entryPoint, context)) {
      throw new CreateError(
        `Failed to replace receive callback for topic "${this.#topicName}"`,
        { topic: this.#topicName },
      );
    }
  }

  /**
   * Remove the registration; no delivery starts afterwards until `setContext()`.
   */
  removeCallback(): void {
    const handle = this.#handle;
    if (handle === undefined) return;
    this.#api.removeReceiveCallback(handle);
  }

  getPublisherCount(): number | undefined {
    return this.#query((h) => this.#api.getPublisherCount(h));
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
   * Remove the registration, then release the handle. Safe to call more than once.
   */
  destroy(): void {
    const handle = this.#handle;
    if (handle === undefined) return;
    this.#handle = undefined;
    this.#api.removeReceiveCallback(handle);
    this.#api.destroy(handle);
    this.#logger.debug(LOG_CONTEXT.SUBSCRIBER, "Subscriber destroyed", {
      topic: this.#topicName,
    });
  }

  #requireHandle(): TransportHandle {
    const handle = this.#handle;
    if (handle === undefined) {
      throw new EndpointDestroyedError(
        `Subscriber for topic "${this.#topicName}" is destroyed`,
        { topic: this.#topicName },
      );
    }
    return handle;
  }

  #query<R>(read: (handle: TransportHandle) => R | undefined): R | undefined {
    const handle = this.#handle;
    if (handle === undefined) return undefined;
    try {
      return read(handle);
    } catch (err) {
      this.#logger.warn(LOG_CONTEXT.SUBSCRIBER, "Metadata query failed", err);
      return undefined;
    }
  }
}
