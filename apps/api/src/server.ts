import express from "express";
import type { Pool } from "pg";
import { healthRouter } from "./routes/health.js";
import { createNoticesRouter } from "./routes/notices.js";
import { createPool } from "./data/db.js";
import { AppError, errorBody } from "./errors.js";
import { buildRequestLog, deriveNoticeContext, isTestRuntime, log } from "./logger.js";
import { type ApiConfig, loadConfig } from "./config/env.js";
import { capabilityAuthorizer } from "./auth/capabilities.js";
import {
  HmacNonceVerifier,
  MemoryStateStore,
  NoticeRegistry,
  PgStateStore,
  loadNoticeCatalog,
  type ContextResolver,
  type NoticeCatalogEntry,
  type StateStore
} from "./notices/index.js";

const REDACTED_KEYS = ["password", "token", "secret", "nonce"];

function sanitizeBody(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeBody(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value).map(([key, val]) => {
      const lower = key.toLowerCase();
      if (REDACTED_KEYS.some((k) => lower.includes(k))) {
        return [key, "[REDACTED]"];
      }
      return [key, sanitizeBody(val)];
    });
    return Object.fromEntries(entries);
  }
  return value;
}

export type ServerDeps = {
  config?: ApiConfig;
  db?: Pool;
  stateStore?: StateStore;
  catalog?: NoticeCatalogEntry[];
  resolveContext?: ContextResolver;
};

export function createStateStore(config: ApiConfig, db?: Pool): StateStore {
  if (config.noticeStore === "pg") {
    return new PgStateStore(db ?? createPool(config.databaseUrl ?? ""));
  }
  return new MemoryStateStore();
}

export function createServer(deps: ServerDeps = {}) {
  const app = express();
  const config = deps.config ?? loadConfig();
  const store = deps.stateStore ?? createStateStore(config, deps.db);
  const verifier = new HmacNonceVerifier({
    secret: config.nonceSecret,
    lifetimeSeconds: config.nonceLifetimeSeconds
  });
  const registry = NoticeRegistry.fromCatalog(
    deps.catalog ?? loadNoticeCatalog(config.noticesFile),
    {
      authorizer: capabilityAuthorizer,
      store,
      verifier,
      dismissUrl: config.dismissUrl
    }
  );
  app.locals.registry = registry;
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start,
          body: sanitizeBody(req.body)
        })
      );
    });
    next();
  });

  app.use("/health", healthRouter);
  app.use(
    "/notices",
    createNoticesRouter({
      registry,
      authSecret: config.authSecret,
      resolveContext: deps.resolveContext
    })
  );
  app.get("/", (_req, res) => {
    res.json({ ok: true, service: "notices-api", status: "healthy" });
  });
  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      const appErr = err instanceof AppError ? err : undefined;
      const status = appErr?.status ?? 500;
      const message =
        appErr?.message ?? (err instanceof Error ? err.message : "Unexpected error");
      const context = deriveNoticeContext(sanitizeBody(_req.body));
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      const level = status >= 500 ? "error" : "info";
      log({
        level,
        msg: "request_error",
        method: _req.method,
        path: _req.originalUrl ?? _req.url,
        status,
        code: appErr?.code ?? "INTERNAL_ERROR",
        error: message,
        error_name: err instanceof Error ? err.name : undefined,
        error_stack:
          ((status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1") &&
          err instanceof Error
            ? err.stack
            : undefined,
        ...context
      });
      res.status(status).json(errorBody(appErr ?? new Error(message)));
    }
  );
  return app;
}
