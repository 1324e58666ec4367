import express from "express";
import type { NextFunction, Response, Router } from "express";
import { unauthorizedError } from "../errors.js";
import { type AuthedRequest, actorFromClaims, requireAuth } from "../auth/middleware.js";
import type { NoticeRegistry } from "../notices/registry.js";
import { type ContextResolver, resolveScreen } from "../notices/context.js";

function bodyField(body: unknown, key: string): string | undefined {
  if (!body || typeof body !== "object" || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

export function buildRenderNoticesHandler(
  registry: NoticeRegistry,
  resolveContext: ContextResolver = resolveScreen
) {
  return async (req: AuthedRequest, res: Response, next: NextFunction) => {
    try {
      if (!req.auth) throw unauthorizedError();
      const html = await registry.renderAll(actorFromClaims(req.auth), resolveContext(req));
      return res.status(200).type("html").send(html);
    } catch (err) {
      next(err);
    }
  };
}

export function buildDismissNoticeHandler(registry: NoticeRegistry) {
  return async (req: AuthedRequest, res: Response, next: NextFunction) => {
    try {
      if (!req.auth) throw unauthorizedError();
      await registry.dispatchDismiss({
        actor: actorFromClaims(req.auth),
        action: bodyField(req.body, "action"),
        id: bodyField(req.body, "id"),
        nonce: bodyField(req.body, "nonce")
      });
      // The client never reads the response; rejected requests look the same.
      return res.status(204).end();
    } catch (err) {
      next(err);
    }
  };
}

export function createNoticesRouter(deps: {
  registry: NoticeRegistry;
  authSecret: string;
  resolveContext?: ContextResolver;
}): Router {
  const router = express.Router();
  router.use(requireAuth(deps.authSecret));
  router.get("/", buildRenderNoticesHandler(deps.registry, deps.resolveContext));
  router.post(
    "/dismiss",
    express.urlencoded({ extended: false }),
    buildDismissNoticeHandler(deps.registry)
  );
  return router;
}
