// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Type metadata attached to every topic.
 *
 * - `encoding`: short stable tag of the format ("raw", "utf-8", "json", "proto", ...)
 * - `typeName`: declared message type name
 * - `descriptor`: format-specific schema blob (empty for simple formats)
 */
export interface DataTypeInfo {
  readonly encoding: string;
  readonly typeName: string;
  readonly descriptor: Uint8Array;
}

/**
 * Transport-assigned identity of a publisher or subscriber on a topic.
 */
export interface TopicId {
  readonly entityId: string;
  readonly processId: number;
  readonly hostName: string;
  readonly topicName: string;
}

/**
 * When to timestamp an outgoing message.
 *
 * - `auto`: the transport assigns its own send time
 * - `custom`: explicit microseconds since the Unix epoch
 */
export type Timestamp =
  | { readonly kind: "auto" }
  | { readonly kind: "custom"; readonly micros: number };

const AUTO_TIMESTAMP: Timestamp = Object.freeze({ kind: "auto" });

export const Timestamp = {
  auto: AUTO_TIMESTAMP,
  custom(micros: number): Timestamp {
    return { kind: "custom", micros };
  },
};

/**
 * Raw delivery data handed to a receive callback by the transport.
 *
 * Only the first `bufferSize` bytes of `buffer` belong to the message.
 */
export interface ReceiveCallbackData {
  readonly buffer: Uint8Array;
  readonly bufferSize: number;
  /** Publisher send timestamp (microseconds since epoch) */
  readonly sendTimestamp: number;
  /** Publisher logical clock at send time */
  readonly sendClock: number;
}

/**
 * A received message, with payload and delivery metadata.
 */
export interface Received<T> {
  /** The decoded payload */
  readonly payload: T;
  /** The topic name this message was received on */
  readonly topicName: string;
  /** The declared encoding format (e.g. "json", "raw") */
  readonly encoding: string;
  /** The declared type name of the message */
  readonly typeName: string;
  /** The publisher's send timestamp (microseconds since epoch) */
  readonly timestamp: number;
  /** The publisher's logical clock at send time */
  readonly clock: number;
}

export type ReceiveHandler<T> = (received: Received<T>) => void;
