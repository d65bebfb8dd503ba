import express, { Express, NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import config from "./config";
import { createReceiptsRouter } from "./routes/receipts";
import { ReceiptStore } from "./models/store";
import { IdGenerator, UuidGenerator } from "./services/idGenerator";
import { logger } from "./utils/logger";

export interface AppOptions {
  store?: ReceiptStore;
  ids?: IdGenerator;
  jsonBodyLimit?: string;
}

interface BodyParserError {
  type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === "object" && err !== null && "type" in err && typeof err.type === "string";
}

function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }
  if (isBodyParserError(err) && err.type === "entity.parse.failed") {
    return res.status(400).json({ error: "Error: invalid receipt JSON" });
  }
  if (isBodyParserError(err) && err.type === "entity.too.large") {
    return res.status(413).json({ error: "Error: receipt payload too large" });
  }
  logger.error(`Error handling ${req.method} ${req.path}`, err);
  res.status(500).json({ error: "Internal Server Error" });
}

// Each app owns its own store; tests build as many independent apps as they need.
export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const store = options.store ?? new ReceiptStore();
  const ids = options.ids ?? new UuidGenerator();

  app.use(bodyParser.json({ limit: options.jsonBodyLimit ?? config.jsonBodyLimit }));

  app.use('/', createReceiptsRouter({ store, ids }));

  app.use(errorHandler);

  return app;
}
