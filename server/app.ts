/**
 * Express application: configuration for the form and the status submission
 * endpoint. Static files of the built UI are served when present.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { ServerConfig } from "../src/config/serverConfig";
import { submitStatus, type StorageConnector } from "../services/statusSubmission";
import { STATUS_TYPES, type ApiErrorBody, type StatusConfigResponse } from "../types";
import {
  AuthenticationError,
  ConfigurationError,
  DocumentWriteError,
  DriveRequestError,
  StatusLedgerError,
  ValidationError,
  toUserMessage,
} from "../utils/errors";
import { getLogger } from "../utils/logger";
import { toIsoDate } from "../utils/statusPeriod";

const log = getLogger("Http");

export interface AppContext {
  config: Pick<ServerConfig, "profiles" | "collaborators" | "rootFolderName"> & { staticDir?: string };
  connect: StorageConnector;
  today?: () => string;
}

/** 4xx status set by body parsing (malformed JSON, oversized payload). */
function clientStatusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function statusCodeFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (!(err instanceof StatusLedgerError)) {
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) return clientStatus;
  }
  if (err instanceof ConfigurationError) return 500;
  if (err instanceof AuthenticationError) return 502;
  if (err instanceof DocumentWriteError || err instanceof DriveRequestError) return 502;
  return 500;
}

export function apiError(err: unknown): ApiErrorBody {
  if (err instanceof StatusLedgerError) return { error: { code: err.code, message: toUserMessage(err) } };
  const code = clientStatusOf(err) !== null ? "InvalidBody" : "InternalError";
  return { error: { code, message: toUserMessage(err) } };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusCodeFor(err);
  if (status >= 500) {
    log.error("request.failed", { status, message: toUserMessage(err) });
  } else {
    log.warn("request.rejected", { status, message: toUserMessage(err) });
  }
  res.status(status).json(apiError(err));
}

export function createApp(ctx: AppContext): express.Application {
  const app = express();
  const today = ctx.today ?? (() => toIsoDate(new Date()));

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/config", (_req, res) => {
    const body: StatusConfigResponse = {
      profiles: ctx.config.profiles,
      statusTypes: [...STATUS_TYPES],
      today: today(),
    };
    res.json(body);
  });

  app.post("/api/status", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await submitStatus(req.body, { config: ctx.config, connect: ctx.connect, today });
      res.status(201).json({
        fileName: result.fileName,
        documentId: result.documentId,
        created: result.created,
      });
    } catch (err) {
      next(err);
    }
  });

  if (ctx.config.staticDir) {
    app.use(express.static(ctx.config.staticDir));
  }

  app.use(errorHandler);

  return app;
}
