// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { EMPTY_DATA_TYPE } from "./data-type.js";
import { DeserializationError, EndpointDestroyedError } from "./errors.js";
import type { MessageFormat } from "./format.js";
import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "./logger.js";
import { validateEndpointOptions, type EndpointOptions } from "./options.js";
import { Subscriber } from "./subscriber.js";
import type { Transport, TransportHandle } from "./transport.js";
import type {
  DataTypeInfo,
  ReceiveCallbackData,
  ReceiveHandler,
  Received,
  TopicId,
} from "./types.js";

/**
 * Why a delivery never reached the handler.
 *
 * - `malformed`: the transport handed over no data or an out-of-range size
 * - `decode`: the format rejected the payload bytes
 */
export interface DropInfo {
  readonly reason: "malformed" | "decode";
  readonly topicName: string;
  readonly encoding: string;
  readonly typeName: string;
  readonly size: number;
}

export interface TypedSubscriberOptions extends EndpointOptions {
  /**
   * Observer for dropped deliveries. Drops are silent unless this is set.
   */
  onDrop?: (info: DropInfo) => void;
}

/**
 * Lifecycle of a typed subscriber.
 *
 * `uninitialized` → `registered` (construction) → `torn-down` (`destroy()`)
 */
export type SubscriberState = "uninitialized" | "registered" | "torn-down";

/**
 * Callback slot: the context registered with the transport.
 *
 * Owned by exactly one TypedSubscriber. Once retired, it never reaches its
 * handler again, even if a transport still holds a reference to it.
 */
class CallbackSlot<T> {
  #active = true;

  constructor(
    readonly handler: ReceiveHandler<T>,
    readonly owner: DeliveryTarget<T>,
  ) {}

  get active(): boolean {
    return this.#active;
  }

  retire(): void {
    this.#active = false;
  }
}

interface DeliveryTarget<T> {
  readonly format: MessageFormat<T>;
  readonly logger: LoggerAdapter;
  drop(info: DropInfo): void;
}

const placeholder = (): void => {};

/**
 * Fixed entry point registered with the transport for every typed subscriber.
 * Runs on whatever turn the transport delivers on.
 */
function deliveryTrampoline<T>(
  topicId: TopicId | undefined,
  dataType: DataTypeInfo | undefined,
  data: ReceiveCallbackData | undefined,
  slot: CallbackSlot<T> | undefined,
): void {
  if (data === undefined || slot === undefined) return;
  if (!slot.active) return;

  const target = slot.owner;
  const info = dataType ?? EMPTY_DATA_TYPE;
  const topicName = topicId?.topicName ?? "";

  const { buffer, bufferSize } = data;
  if (
    !Number.isSafeInteger(bufferSize) ||
    bufferSize < 0 ||
    bufferSize > buffer.length
  ) {
    target.drop({
      reason: "malformed",
      topicName,
      encoding: info.encoding,
      typeName: info.typeName,
      size: buffer.length,
    });
    return;
  }

  const view = buffer.subarray(0, bufferSize);
  const bytes = target.format.receive === "borrow" ? view : view.slice();

  let payload: T | undefined;
  try {
    payload = target.format.decode(bytes, info);
  } catch (err) {
    target.logger.debug(
      LOG_CONTEXT.DELIVERY,
      "Decoder threw",
      new DeserializationError(`Failed to decode ${info.encoding} payload`, {
        cause: err,
        topic: topicName,
      }),
    );
    payload = undefined;
  }

  if (payload === undefined) {
    target.drop({
      reason: "decode",
      topicName,
      encoding: info.encoding,
      typeName: info.typeName,
      size: bufferSize,
    });
    return;
  }

  const received: Received<T> = {
    payload,
    topicName,
    encoding: info.encoding,
    typeName: info.typeName,
    timestamp: data.sendTimestamp,
    clock: data.sendClock,
  };

  try {
    slot.handler(received);
  } catch (err) {
    target.logger.error(
      LOG_CONTEXT.DELIVERY,
      `Handler error on topic "${topicName}"`,
      err instanceof Error ? err.message : String(err),
    );
  }
}

/**
 * Type-safe subscriber for messages of type `T`.
 *
 * ## Core invariants
 *
 * **Register before retire**: `setCallback()` installs the new slot with the
 * transport first and retires the previous one afterwards, so the transport always
 * holds a live entry point.
 *
 * **Unregister before retire**: `destroy()` removes the transport registration
 * first and retires the slot afterwards. Reversing the order would let a delivery
 * start against a retired slot.
 *
 * **Malformed payloads are dropped**: decode failures never reach the handler and
 * never throw into the transport. Count them with `droppedCount` or observe them
 * with the `onDrop` option.
 *
 * @example
 * ```typescript
 * const subscriber = createTypedSubscriber(transport, "simple", zodJson(Simple));
 * subscriber.setCallback(({ payload, topicName, timestamp }) => {
 *   console.log(topicName, payload.count, timestamp);
 * });
 * ```
 */
export class TypedSubscriber<T> {
  readonly #target: DeliveryTarget<T>;
  readonly #logger: LoggerAdapter;
  readonly #onDrop: ((info: DropInfo) => void) | undefined;
  readonly #subscriber: Subscriber<CallbackSlot<T>>;
  #slot: CallbackSlot<T>;
  #state: SubscriberState = "uninitialized";
  #dropped = 0;

  constructor(
    transport: Transport,
    topicName: string,
    format: MessageFormat<T>,
    options: TypedSubscriberOptions = {},
  ) {
    validateEndpointOptions(options, "subscriber", ["onDrop"]);
    this.#logger = options.logger ?? noopLogger;
    this.#onDrop = options.onDrop;
    this.#target = {
      format,
      logger: this.#logger,
      drop: (info) => this.#drop(info),
    };
    this.#slot = new CallbackSlot<T>(placeholder, this.#target);
    this.#subscriber = new Subscriber(
      transport,
      topicName,
      format.dataType(),
      deliveryTrampoline<T>,
      this.#slot,
      { logger: this.#logger },
    );
    this.#state = "registered";
  }

  get state(): SubscriberState {
    return this.#state;
  }

  get rawHandle(): TransportHandle | undefined {
    return this.#subscriber.rawHandle;
  }

  /**
   * Number of deliveries dropped as malformed or undecodable.
   */
  get droppedCount(): number {
    return this.#dropped;
  }

  /**
   * Replace the handler. The previous handler is never invoked once this returns.
   *
   * @throws EndpointDestroyedError after `destroy()`
   */
  setCallback(handler: ReceiveHandler<T>): void {
    if (this.#state !== "registered") {
      throw new EndpointDestroyedError(
        "Cannot set callback on a torn-down subscriber",
      );
    }
    const next = new CallbackSlot(handler, this.#target);
    this.#subscriber.setContext(next);
    const previous = this.#slot;
    this.#slot = next;
    previous.retire();
  }

  getPublisherCount(): number | undefined {
    return this.#subscriber.getPublisherCount();
  }

  getTopicName(): string | undefined {
    return this.#subscriber.getTopicName();
  }

  getTopicId(): TopicId | undefined {
    return this.#subscriber.getTopicId();
  }

  getDataTypeInformation(): DataTypeInfo | undefined {
    return this.#subscriber.getDataTypeInformation();
  }

  /**
   * Remove the transport registration, then retire the handler.
   * Safe to call more than once.
   */
  destroy(): void {
    if (this.#state === "torn-down") return;
    this.#subscriber.destroy();
    this.#slot.retire();
    this.#state = "torn-down";
  }

  #drop(info: DropInfo): void {
    this.#dropped += 1;
    this.#logger.debug(LOG_CONTEXT.DELIVERY, "Delivery dropped", info);
    if (!this.#onDrop) return;
    try {
      this.#onDrop(info);
    } catch (err) {
      this.#logger.error(LOG_CONTEXT.DELIVERY, "onDrop observer threw", err);
    }
  }
}

/**
 * Factory function to create a TypedSubscriber
 */
export function createTypedSubscriber<T>(
  transport: Transport,
  topicName: string,
  format: MessageFormat<T>,
  options?: TypedSubscriberOptions,
): TypedSubscriber<T> {
  return new TypedSubscriber(transport, topicName, format, options);
}
