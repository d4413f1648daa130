// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { hostname } from "node:os";
import {
  ConfigurationError,
  LOG_CONTEXT,
  SEND_FAILED,
  SEND_OK,
  copyDataTypeInfo,
  noopLogger,
  validateIntegerOption,
  validateOptionKeys,
  type DataTypeInfo,
  type LoggerAdapter,
  type ReceiveCallback,
  type ReceiveCallbackData,
  type SendStatus,
  type TopicId,
  type Transport,
  type TransportHandle,
  type TransportPayloadWriter,
  type TransportPublisherApi,
  type TransportSubscriberApi,
} from "@ferry/core";

/**
 * Time source, in milliseconds since the Unix epoch.
 */
export interface Clock {
  now(): number;
}

export type DispatchMode = "immediate" | "deferred";

export interface MemoryTransportOptions {
  /**
   * Deliver views of the publisher's memfile (true, default) or a private copy per
   * subscriber (false).
   */
  zeroCopy?: boolean;

  /**
   * Memfiles per publisher (default: 1, max: 64). A memfile is reused by the next
   * send once no pending delivery reads it.
   */
  bufferCount?: number;

  /**
   * - "deferred" (default): deliveries run on a later microtask
   * - "immediate": deliveries run before the send returns. A handler that starts a
   *   zero-copy send of its own is then nested inside the outer one and fails.
   */
  dispatch?: DispatchMode;

  /**
   * Maximum number of live handles (default: Infinity). Creation beyond the limit
   * fails the way a transport out of resources does.
   */
  maxHandles?: number;

  /** Host name reported in topic ids (default: os.hostname()) */
  hostName?: string;

  /** Process id reported in topic ids (default: process.pid) */
  processId?: number;

  /** Source of auto timestamps (default: Date) */
  clock?: Clock;

  /**
   * Optional observability sink. Never logs by default.
   */
  logger?: LoggerAdapter;
}

/**
 * Memory transport with introspection helpers for tests and samples.
 */
export interface MemoryTransport extends Transport {
  /**
   * Resolves once every queued delivery has run.
   */
  flush(): Promise<void>;

  listTopics(): readonly string[];

  /**
   * Destroy every handle and drop queued deliveries.
   */
  dispose(): void;
}

interface Memfile {
  buffer: Uint8Array;
  // Size of the last successful write; undefined when the content is not reusable.
  lastSize: number | undefined;
  readers: number;
}

interface PublisherRecord {
  readonly id: TransportHandle;
  readonly topicId: TopicId;
  readonly dataType: DataTypeInfo;
  clock: number;
  memfiles: Memfile[];
}

interface Registration {
  invoke(
    topicId: TopicId,
    dataType: DataTypeInfo,
    data: ReceiveCallbackData,
  ): void;
}

interface Delivery {
  readonly topicId: TopicId;
  readonly dataType: DataTypeInfo;
  readonly data: ReceiveCallbackData;
  readonly memfile: Memfile | undefined;
}

interface SubscriberRecord {
  readonly id: TransportHandle;
  readonly topicId: TopicId;
  readonly dataType: DataTypeInfo;
  registration: Registration | undefined;
  queue: Delivery[];
  draining: boolean;
  scheduled: boolean;
}

interface TopicEntry {
  publishers: Set<TransportHandle>;
  subscribers: Set<TransportHandle>;
}

const ALLOWED_KEYS = [
  "zeroCopy",
  "bufferCount",
  "dispatch",
  "maxHandles",
  "hostName",
  "processId",
  "clock",
  "logger",
] as const;

const MAX_BUFFER_COUNT = 64;

function validateOptions(options: MemoryTransportOptions): void {
  validateOptionKeys(options, ALLOWED_KEYS, "memory transport");
  if (options.bufferCount !== undefined) {
    validateIntegerOption("bufferCount", options.bufferCount, 1, MAX_BUFFER_COUNT);
  }
  if (options.maxHandles !== undefined) {
    validateIntegerOption("maxHandles", options.maxHandles, 0);
  }
  if (options.processId !== undefined) {
    validateIntegerOption("processId", options.processId, 0);
  }
  if (
    options.dispatch !== undefined &&
    options.dispatch !== "immediate" &&
    options.dispatch !== "deferred"
  ) {
    throw new ConfigurationError(
      `Option "dispatch" must be "immediate" or "deferred", got ${String(options.dispatch)}`,
    );
  }
}

/**
 * In-process transport: topic registry, memfile buffers and per-subscriber delivery
 * queues.
 *
 * For single-process deployments, samples and tests. Publishers and subscribers
 * match by topic name; every subscriber receives the publisher's DataTypeInfo.
 *
 * ## Memfiles
 *
 * Each publisher owns up to `bufferCount` memfiles. A send takes a memfile that no
 * pending delivery reads: if it held a payload of the same size, the writer gets
 * `writeModified`, otherwise `writeFull` on fresh contents. When every memfile is
 * still being read, the oldest one is replaced by a new buffer, so a reader never
 * observes a payload being modified under it.
 *
 * ## Delivery
 *
 * Deliveries to one subscriber run one at a time, in send order, including sends
 * issued from inside a callback. A delivery looks up the registration when it
 * starts: replaced or removed callbacks are never invoked afterwards.
 *
 * @example
 * ```typescript
 * import { memoryTransport } from "@ferry/memory";
 *
 * const transport = memoryTransport({ dispatch: "immediate" });
 * const publisher = createTypedPublisher(transport, "hello", stringFormat());
 * ```
 */
export function memoryTransport(
  options: MemoryTransportOptions = {},
): MemoryTransport {
  validateOptions(options);

  const zeroCopy = options.zeroCopy ?? true;
  const bufferCount = options.bufferCount ?? 1;
  const dispatch = options.dispatch ?? "deferred";
  const maxHandles = options.maxHandles ?? Number.POSITIVE_INFINITY;
  const hostName = options.hostName ?? hostname();
  const processId = options.processId ?? process.pid;
  const clock = options.clock ?? Date;
  const logger = options.logger ?? noopLogger;

  const topics = new Map<string, TopicEntry>();
  const publishers = new Map<TransportHandle, PublisherRecord>();
  const subscribers = new Map<TransportHandle, SubscriberRecord>();

  let nextHandle = 1;
  let pending = 0;
  let flushWaiters: Array<() => void> = [];

  function liveHandles(): number {
    return publishers.size + subscribers.size;
  }

  function issueHandle(topicName: string): TransportHandle | undefined {
    if (topicName.length === 0) return undefined;
    if (liveHandles() >= maxHandles) {
      logger.warn(LOG_CONTEXT.TRANSPORT, "Handle limit reached", {
        topic: topicName,
        maxHandles,
      });
      return undefined;
    }
    return nextHandle++;
  }

  function topicEntry(topicName: string): TopicEntry {
    let entry = topics.get(topicName);
    if (!entry) {
      entry = { publishers: new Set(), subscribers: new Set() };
      topics.set(topicName, entry);
    }
    return entry;
  }

  function releaseTopic(
    topicName: string,
    handle: TransportHandle,
    role: "publishers" | "subscribers",
  ): void {
    const entry = topics.get(topicName);
    if (!entry) return;
    entry[role].delete(handle);
    if (entry.publishers.size === 0 && entry.subscribers.size === 0) {
      topics.delete(topicName);
    }
  }

  function makeTopicId(id: TransportHandle, topicName: string): TopicId {
    return Object.freeze({
      entityId: String(id),
      processId,
      hostName,
      topicName,
    });
  }

  function settle(delivery: Delivery): void {
    if (delivery.memfile) delivery.memfile.readers -= 1;
    pending -= 1;
    if (pending === 0 && flushWaiters.length > 0) {
      const waiters = flushWaiters;
      flushWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  function drain(record: SubscriberRecord): void {
    if (record.draining) return;
    record.draining = true;
    try {
      let delivery = record.queue.shift();
      while (delivery !== undefined) {
        try {
          record.registration?.invoke(
            delivery.topicId,
            delivery.dataType,
            delivery.data,
          );
        } catch (err) {
          logger.error(LOG_CONTEXT.DELIVERY, "Receive callback error", {
            topic: record.topicId.topicName,
            error: err instanceof Error ? err.message : String(err),
          });
        } finally {
          settle(delivery);
        }
        delivery = record.queue.shift();
      }
    } finally {
      record.draining = false;
    }
  }

  function schedule(record: SubscriberRecord): void {
    if (dispatch === "immediate") {
      drain(record);
      return;
    }
    if (record.scheduled) return;
    record.scheduled = true;
    queueMicrotask(() => {
      record.scheduled = false;
      if (subscribers.get(record.id) === record) drain(record);
    });
  }

  function enqueue(record: SubscriberRecord, delivery: Delivery): void {
    if (delivery.memfile) delivery.memfile.readers += 1;
    pending += 1;
    record.queue.push(delivery);
    schedule(record);
  }

  function dropQueue(record: SubscriberRecord): void {
    const queued = record.queue;
    record.queue = [];
    for (const delivery of queued) settle(delivery);
  }

  function acquireMemfile(
    record: PublisherRecord,
    size: number,
  ): { memfile: Memfile; fresh: boolean } {
    const idle = record.memfiles.filter((m) => m.readers === 0);

    const reusable = idle.find((m) => m.lastSize === size);
    if (reusable) {
      touch(record, reusable);
      return { memfile: reusable, fresh: false };
    }

    const [candidate] = idle;
    if (candidate) {
      if (candidate.buffer.length < size) candidate.buffer = new Uint8Array(size);
      candidate.lastSize = undefined;
      touch(record, candidate);
      return { memfile: candidate, fresh: true };
    }

    const memfile: Memfile = {
      buffer: new Uint8Array(size),
      lastSize: undefined,
      readers: 0,
    };
    if (record.memfiles.length >= bufferCount) {
      // Every memfile is still read: retire the oldest; its readers keep their view.
      record.memfiles.shift();
    }
    record.memfiles.push(memfile);
    return { memfile, fresh: true };
  }

  // Most recently used memfile goes last, so shift() always drops the oldest.
  function touch(record: PublisherRecord, memfile: Memfile): void {
    const index = record.memfiles.indexOf(memfile);
    if (index >= 0 && index !== record.memfiles.length - 1) {
      record.memfiles.splice(index, 1);
      record.memfiles.push(memfile);
    }
  }

  function publish(
    handle: TransportHandle,
    writer: TransportPayloadWriter,
    timestamp: number | undefined,
  ): SendStatus {
    const record = publishers.get(handle);
    if (!record) return SEND_FAILED;

    const size = writer.getSize();
    if (!Number.isSafeInteger(size) || size < 0) {
      logger.warn(LOG_CONTEXT.TRANSPORT, "Writer reported an invalid size", {
        topic: record.topicId.topicName,
        size,
      });
      return SEND_FAILED;
    }

    const { memfile, fresh } = acquireMemfile(record, size);
    const view = memfile.buffer.subarray(0, size);
    const status = fresh
      ? writer.writeFull(view, size)
      : writer.writeModified(view, size);
    if (status !== SEND_OK) {
      memfile.lastSize = undefined;
      logger.debug(LOG_CONTEXT.TRANSPORT, "Payload write failed", {
        topic: record.topicId.topicName,
        fresh,
      });
      return SEND_FAILED;
    }
    memfile.lastSize = size;

    record.clock += 1;
    const sendTimestamp = timestamp ?? Math.round(clock.now() * 1000);
    const sendClock = record.clock;

    const entry = topics.get(record.topicId.topicName);
    // Snapshot: an immediate-dispatch callback may subscribe to this topic.
    for (const subscriberId of Array.from(entry?.subscribers ?? [])) {
      const subscriber = subscribers.get(subscriberId);
      if (!subscriber?.registration) continue;
      enqueue(subscriber, {
        topicId: record.topicId,
        dataType: record.dataType,
        data: {
          buffer: zeroCopy ? view : view.slice(),
          bufferSize: size,
          sendTimestamp,
          sendClock,
        },
        memfile: zeroCopy ? memfile : undefined,
      });
    }
    return SEND_OK;
  }

  const publisherApi: TransportPublisherApi = {
    create(topicName, dataType) {
      const id = issueHandle(topicName);
      if (id === undefined) return undefined;
      publishers.set(id, {
        id,
        topicId: makeTopicId(id, topicName),
        dataType: copyDataTypeInfo(dataType),
        clock: 0,
        memfiles: [],
      });
      topicEntry(topicName).publishers.add(id);
      logger.debug(LOG_CONTEXT.TRANSPORT, "Publisher handle created", {
        topic: topicName,
        handle: id,
      });
      return id;
    },

    destroy(handle) {
      const record = publishers.get(handle);
      if (!record) return;
      publishers.delete(handle);
      releaseTopic(record.topicId.topicName, handle, "publishers");
      record.memfiles = [];
    },

    send(handle, data, timestamp) {
      return publish(
        handle,
        {
          getSize: () => data.length,
          writeFull(buffer) {
            buffer.set(data);
            return SEND_OK;
          },
          writeModified(buffer) {
            buffer.set(data);
            return SEND_OK;
          },
        },
        timestamp,
      );
    },

    sendPayloadWriter(handle, writer, timestamp) {
      return publish(handle, writer, timestamp);
    },

    getSubscriberCount(handle) {
      const record = publishers.get(handle);
      if (!record) return undefined;
      return topics.get(record.topicId.topicName)?.subscribers.size ?? 0;
    },

    getTopicName(handle) {
      return publishers.get(handle)?.topicId.topicName;
    },

    getTopicId(handle) {
      return publishers.get(handle)?.topicId;
    },

    getDataTypeInformation(handle) {
      const record = publishers.get(handle);
      return record && copyDataTypeInfo(record.dataType);
    },
  };

  const subscriberApi: TransportSubscriberApi = {
    create(topicName, dataType) {
      const id = issueHandle(topicName);
      if (id === undefined) return undefined;
      subscribers.set(id, {
        id,
        topicId: makeTopicId(id, topicName),
        dataType: copyDataTypeInfo(dataType),
        registration: undefined,
        queue: [],
        draining: false,
        scheduled: false,
      });
      topicEntry(topicName).subscribers.add(id);
      logger.debug(LOG_CONTEXT.TRANSPORT, "Subscriber handle created", {
        topic: topicName,
        handle: id,
      });
      return id;
    },

    destroy(handle) {
      const record = subscribers.get(handle);
      if (!record) return;
      subscribers.delete(handle);
      record.registration = undefined;
      dropQueue(record);
      releaseTopic(record.topicId.topicName, handle, "subscribers");
    },

    setReceiveCallback<C>(
      handle: TransportHandle,
      callback: ReceiveCallback<C>,
      context: C,
    ): boolean {
      const record = subscribers.get(handle);
      if (!record) return false;
      record.registration = {
        invoke: (topicId, dataType, data) =>
          callback(topicId, dataType, data, context),
      };
      return true;
    },

    removeReceiveCallback(handle) {
      const record = subscribers.get(handle);
      if (!record) return false;
      record.registration = undefined;
      return true;
    },

    getPublisherCount(handle) {
      const record = subscribers.get(handle);
      if (!record) return undefined;
      return topics.get(record.topicId.topicName)?.publishers.size ?? 0;
    },

    getTopicName(handle) {
      return subscribers.get(handle)?.topicId.topicName;
    },

    getTopicId(handle) {
      return subscribers.get(handle)?.topicId;
    },

    getDataTypeInformation(handle) {
      const record = subscribers.get(handle);
      return record && copyDataTypeInfo(record.dataType);
    },
  };

  return {
    publisher: publisherApi,
    subscriber: subscriberApi,

    flush(): Promise<void> {
      if (pending === 0) return Promise.resolve();
      return new Promise((resolve) => {
        flushWaiters.push(resolve);
      });
    },

    listTopics(): readonly string[] {
      return Object.freeze(Array.from(topics.keys()));
    },

    dispose(): void {
      for (const handle of Array.from(subscribers.keys())) {
        subscriberApi.destroy(handle);
      }
      for (const handle of Array.from(publishers.keys())) {
        publisherApi.destroy(handle);
      }
    },
  };
}
