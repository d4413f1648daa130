// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Zero-copy send of a 1 KiB frame: the first send fills the whole buffer, later
 * sends patch one byte of the buffer they get back.
 *
 *   npm run example:zero-copy
 */

import {
  bytesFormat,
  createLogger,
  createTypedPublisher,
  createTypedSubscriber,
  type PayloadWriter,
} from "@ferry/core";
import { memoryTransport } from "@ferry/memory";

class FrameWriter implements PayloadWriter {
  #tick = 0;

  constructor(private readonly size: number) {}

  getSize(): number {
    return this.size;
  }

  writeFull(buffer: Uint8Array): boolean {
    buffer.fill(0x2a);
    buffer[0] = this.#tick++ & 0xff;
    return true;
  }

  writeModified(buffer: Uint8Array): boolean {
    buffer[0] = this.#tick++ & 0xff;
    return true;
  }
}

const logger = createLogger({ minLevel: "info" });
const transport = memoryTransport({ logger });

const subscriber = createTypedSubscriber(transport, "frames", bytesFormat());
subscriber.setCallback(({ payload, clock }) => {
  logger.info("example", `frame #${clock}`, {
    size: payload.length,
    head: payload[0],
    tail: payload[payload.length - 1],
  });
});

const publisher = createTypedPublisher(transport, "frames", bytesFormat(), {
  logger,
});
const writer = new FrameWriter(1024);

for (let i = 0; i < 5; i++) {
  if (!publisher.sendPayloadWriter(writer)) {
    logger.warn("example", "send failed");
  }
  await transport.flush();
}

transport.dispose();
