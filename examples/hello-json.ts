// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Publish a counter as JSON once per 500ms and print what arrives.
 *
 *   npm run example:hello
 */

import {
  createLogger,
  createTypedPublisher,
  createTypedSubscriber,
} from "@ferry/core";
import { memoryTransport } from "@ferry/memory";
import { z, zodJson } from "@ferry/zod";

const Hello = z
  .object({ message: z.string(), count: z.number().int() })
  .meta({ id: "hello.Hello" });

const logger = createLogger({ minLevel: "info" });
const transport = memoryTransport({ logger });

const subscriber = createTypedSubscriber(transport, "hello", zodJson(Hello), {
  logger,
});
subscriber.setCallback(({ payload, typeName, timestamp, clock }) => {
  logger.info("example", `${typeName} #${clock}: ${payload.message}`, {
    count: payload.count,
    timestamp,
  });
});

const publisher = createTypedPublisher(transport, "hello", zodJson(Hello), {
  logger,
});

for (let count = 1; count <= 5; count++) {
  publisher.send({ message: "Hello from TypeScript", count });
  await new Promise((resolve) => setTimeout(resolve, 500));
}

await transport.flush();
subscriber.destroy();
publisher.destroy();
transport.dispose();
