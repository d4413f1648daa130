// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Transport contract (core-level).
 * Implementations: in-memory (`@ferry/memory`), shared-memory bindings, etc.
 *
 * Core never moves bytes itself. It creates handles, hands payloads or writer
 * callbacks to the transport and receives deliveries through one registered
 * entry point per subscriber.
 */

import type { DataTypeInfo, ReceiveCallbackData, TopicId } from "./types.js";

/**
 * Opaque handle issued by the transport. Only meaningful to the issuer.
 */
export type TransportHandle = number;

/**
 * Status code returned by send operations. 0 means success.
 */
export type SendStatus = number;

export const SEND_OK: SendStatus = 0;
export const SEND_FAILED: SendStatus = -1;

/**
 * Writer callbacks the transport invokes during a zero-copy send.
 *
 * They carry no user data; the core bridge reaches the active PayloadWriter through
 * the active writer slot. `buffer` is transport memory of `size` bytes.
 */
export interface TransportPayloadWriter {
  writeFull(buffer: Uint8Array, size: number): SendStatus;
  writeModified(buffer: Uint8Array, size: number): SendStatus;
  getSize(): number;
}

/**
 * Delivery entry point. Every argument may be absent on a malformed or cancelled
 * delivery; the context is whatever was passed to `setReceiveCallback`.
 */
export type ReceiveCallback<C> = (
  topicId: TopicId | undefined,
  dataType: DataTypeInfo | undefined,
  data: ReceiveCallbackData | undefined,
  context: C | undefined,
) => void;

export interface TransportPublisherApi {
  /**
   * Create a publisher handle. Returns undefined when the transport refuses.
   */
  create(topicName: string, dataType: DataTypeInfo): TransportHandle | undefined;

  destroy(handle: TransportHandle): void;

  /**
   * Copy `data` into a transport buffer and publish it.
   *
   * @param timestamp - Explicit send time in microseconds; transport time when omitted
   */
  send(
    handle: TransportHandle,
    data: Uint8Array,
    timestamp?: number,
  ): SendStatus;

  /**
   * Publish by letting the writer fill a transport buffer in place. The writer
   * callbacks run synchronously before this returns.
   */
  sendPayloadWriter(
    handle: TransportHandle,
    writer: TransportPayloadWriter,
    timestamp?: number,
  ): SendStatus;

  getSubscriberCount(handle: TransportHandle): number | undefined;
  getTopicName(handle: TransportHandle): string | undefined;
  getTopicId(handle: TransportHandle): TopicId | undefined;
  getDataTypeInformation(handle: TransportHandle): DataTypeInfo | undefined;
}

export interface TransportSubscriberApi {
  create(topicName: string, dataType: DataTypeInfo): TransportHandle | undefined;

  destroy(handle: TransportHandle): void;

  /**
   * Register (or replace) the delivery entry point and its context.
   * Replacement is atomic with respect to deliveries: a delivery resolves its
   * registration when it starts and never sees a half-replaced pair.
   */
  setReceiveCallback<C>(
    handle: TransportHandle,
    callback: ReceiveCallback<C>,
    context: C,
  ): boolean;

  /**
   * Remove the registration. No delivery starts against it afterwards.
   */
  removeReceiveCallback(handle: TransportHandle): boolean;

  getPublisherCount(handle: TransportHandle): number | undefined;
  getTopicName(handle: TransportHandle): string | undefined;
  getTopicId(handle: TransportHandle): TopicId | undefined;
  getDataTypeInformation(handle: TransportHandle): DataTypeInfo | undefined;
}

export interface Transport {
  readonly publisher: TransportPublisherApi;
  readonly subscriber: TransportSubscriberApi;
}
