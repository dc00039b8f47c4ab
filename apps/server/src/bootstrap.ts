import { createLogger } from "@deckname/core";
import type { Logger } from "@deckname/core";
import { RenamerService } from "@deckname/renamer";
import type { ServerConfig } from "./server-config";

export interface ServerRuntime {
  service: RenamerService;
  logger: Logger;
}

export function bootstrapServerRuntime(config: ServerConfig, logger: Logger = createLogger({ level: config.logLevel })): ServerRuntime {
  const service = new RenamerService({
    logger,
    workers: config.renameWorkers,
    maxFilenameLength: config.maxFilenameLength,
    defaultTemplate: config.defaultTemplate,
    undoTtlMs: config.undoTtlSeconds * 1000,
    eventSink: {
      append: (event) => {
        if (event.type !== "OPERATION_PROGRESS") {
          logger.debug("operation event", { type: event.type, operationId: event.payload.operationId });
        }
      }
    }
  });
  return { service, logger };
}
