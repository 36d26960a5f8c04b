import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";

import { parseUserId, type DecisionEngine } from "../core/engine";
import { InvalidPayloadError, ServiceError, UnknownUserError } from "../core/errors";
import { INVALID_REQUEST_REASON, noActionDecision } from "../types/common";
import { AnalyzeBodySchema, CreateUserBodySchema, PreferencesUpdateSchema } from "../types/schemas";
import type { PreferencesStore } from "../store/preferences";
import { createLogger, type Logger } from "../util/log";

export const SERVICE_NAME = "playback-filter";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  store: PreferencesStore;
  engine: DecisionEngine;
  corsOrigin?: string;
  jsonLimit?: string;
  logger?: Logger;
}

/** 4xx errors raised by express.json (malformed body, too large, bad charset). */
function clientErrorStatus(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

function userIdParam(req: Request): number {
  const id = parseUserId(req.params.id ?? "");
  if (id === null) throw new UnknownUserError(req.params.id ?? "");
  return id;
}

export function createApp(deps: AppDeps): Express {
  const { store, engine } = deps;
  const log = deps.logger ?? createLogger("api");

  const app = express();
  app.use(cors({ origin: deps.corsOrigin ?? "*" }));
  app.use(express.json({ limit: deps.jsonLimit ?? "512kb" }));

  // ---- Health ----
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  // ---- Users & preferences ----
  app.post("/api/users", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = CreateUserBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidPayloadError("username is required", parsed.error.flatten());
      }
      const user = await store.createUser(parsed.data.username);
      const preferences = await store.getPreferences(user.id);
      log.info("user created", { user_id: user.id });
      res.status(201).json({ user_id: user.id, username: user.username, preferences });
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/users/:id/preferences", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = userIdParam(req);
      const preferences = await store.getPreferences(id);
      if (!preferences) throw new UnknownUserError(id);
      res.json({ user_id: id, ...preferences });
    } catch (err) {
      next(err);
    }
  });

  app.put("/api/users/:id/preferences", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = userIdParam(req);
      if (!(await store.getUser(id))) throw new UnknownUserError(id);

      const parsed = PreferencesUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidPayloadError("invalid preferences", parsed.error.flatten());
      }
      const preferences = await store.updatePreferences(id, parsed.data);
      if (!preferences) throw new UnknownUserError(id);

      log.info("preferences updated", { user_id: id });
      res.json({
        message: "Preferences updated successfully",
        preferences: { user_id: id, ...preferences },
      });
    } catch (err) {
      next(err);
    }
  });

  // ---- Decisions ----
  app.post("/api/analyze", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = AnalyzeBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidPayloadError("user_id and text are required", parsed.error.flatten());
      }
      const { user_id, text } = parsed.data;
      const { action } = await engine.analyze(user_id, text);
      res.json({ action, text, user_id });
    } catch (err) {
      next(err);
    }
  });

  // Always 200 with a well-formed decision; failures travel in `reason`.
  app.post("/event", async (req: Request, res: Response) => {
    try {
      res.json(await engine.handleEvent(req.body));
    } catch (err) {
      log.error("event handling failed", { error: (err as Error).message });
      res.json(noActionDecision(INVALID_REQUEST_REASON));
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found", message: "Endpoint not found" });
  });

  // ---- Error handler (no raw text logging) ----
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const clientStatus = clientErrorStatus(err);

    if (req.path.replace(/\/+$/, "").toLowerCase() === "/event") {
      res.status(200).json(noActionDecision(INVALID_REQUEST_REASON));
      return;
    }
    if (err instanceof ServiceError) {
      const details = err instanceof InvalidPayloadError ? err.details : undefined;
      if (err.statusCode >= 500) log.error(err.message, { code: err.code });
      res.status(err.statusCode).json({ error: err.code, message: err.message, details });
      return;
    }
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({
        error: err instanceof SyntaxError ? "invalid_json" : "bad_request",
        message: (err as Error).message,
      });
      return;
    }

    log.error("unhandled error", { path: req.path, error: (err as Error)?.message });
    res.status(500).json({ error: "internal_error", message: "Internal server error" });
  });

  return app;
}
