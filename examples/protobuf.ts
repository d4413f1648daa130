// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Protobuf messages from a schema defined in code.
 *
 *   npm run example:protobuf
 */

import {
  createLogger,
  createTypedPublisher,
  createTypedSubscriber,
} from "@ferry/core";
import { memoryTransport } from "@ferry/memory";
import { protobufFormat } from "@ferry/protobuf";
import protobuf from "protobufjs";

const root = protobuf.Root.fromJSON({
  nested: {
    demo: {
      nested: {
        Reading: {
          fields: {
            sensor: { type: "string", id: 1 },
            value: { type: "double", id: 2 },
          },
        },
      },
    },
  },
});
const Reading = root.lookupType("demo.Reading");

const logger = createLogger({ minLevel: "info" });
const transport = memoryTransport({ logger });

const subscriber = createTypedSubscriber(
  transport,
  "readings",
  protobufFormat(Reading),
  {
    logger,
    onDrop: (info) => logger.warn("example", "dropped", info),
  },
);
subscriber.setCallback(({ payload, typeName }) => {
  logger.info("example", typeName, payload);
});

const publisher = createTypedPublisher(
  transport,
  "readings",
  protobufFormat(Reading),
);

for (const value of [20.5, 21, 21.25]) {
  publisher.send({ sensor: "thermo-1", value });
}

await transport.flush();
transport.dispose();
