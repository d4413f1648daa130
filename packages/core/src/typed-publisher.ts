// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { MessageFormat } from "./format.js";
import type { EndpointOptions } from "./options.js";
import type { PayloadWriter } from "./payload-writer.js";
import { Publisher } from "./publisher.js";
import type { Transport, TransportHandle } from "./transport.js";
import { Timestamp, type DataTypeInfo, type TopicId } from "./types.js";

/**
 * Type-safe publisher for messages of type `T`.
 *
 * The format's DataTypeInfo is bound once at construction; every `send()` encodes
 * through the format and hands the bytes to the untyped publisher.
 *
 * @example
 * ```typescript
 * import { createTypedPublisher } from "@ferry/core";
 * import { zodJson, z } from "@ferry/zod";
 *
 * const Simple = z.object({ message: z.string(), count: z.number() });
 * const publisher = createTypedPublisher(transport, "simple", zodJson(Simple));
 * publisher.send({ message: "hi", count: 1 });
 * ```
 */
export class TypedPublisher<T> {
  readonly #publisher: Publisher;
  readonly #format: MessageFormat<T>;

  constructor(
    transport: Transport,
    topicName: string,
    format: MessageFormat<T>,
    options: EndpointOptions = {},
  ) {
    this.#format = format;
    this.#publisher = new Publisher(
      transport,
      topicName,
      format.dataType(),
      options,
    );
  }

  get rawHandle(): TransportHandle | undefined {
    return this.#publisher.rawHandle;
  }

  get destroyed(): boolean {
    return this.#publisher.destroyed;
  }

  /**
   * Encode `message` and publish it.
   *
   * @returns true on success, false on failure
   * @throws SerializationError when the format cannot encode the value
   */
  send(message: T, timestamp: Timestamp = Timestamp.auto): boolean {
    if (this.#publisher.destroyed) return false;
    const bytes = this.#format.encode(message);
    return this.#publisher.send(bytes, timestamp);
  }

  /**
   * Zero-copy send for payloads that are their own writer (e.g. `bytesWriter()`),
   * bypassing the format's encoder.
   */
  sendPayloadWriter(
    writer: PayloadWriter,
    timestamp: Timestamp = Timestamp.auto,
  ): boolean {
    return this.#publisher.sendPayloadWriter(writer, timestamp);
  }

  getSubscriberCount(): number | undefined {
    return this.#publisher.getSubscriberCount();
  }

  getTopicName(): string | undefined {
    return this.#publisher.getTopicName();
  }

  getTopicId(): TopicId | undefined {
    return this.#publisher.getTopicId();
  }

  getDataTypeInformation(): DataTypeInfo | undefined {
    return this.#publisher.getDataTypeInformation();
  }

  destroy(): void {
    this.#publisher.destroy();
  }
}

/**
 * Factory function to create a TypedPublisher
 */
export function createTypedPublisher<T>(
  transport: Transport,
  topicName: string,
  format: MessageFormat<T>,
  options?: EndpointOptions,
): TypedPublisher<T> {
  return new TypedPublisher(transport, topicName, format, options);
}
