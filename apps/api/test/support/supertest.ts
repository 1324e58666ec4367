import type { Express } from "express";
import request from "supertest";
import { signToken } from "../../src/auth/token.js";
import type { Actor } from "../../src/auth/capabilities.js";

export type ApiAgent = ReturnType<typeof request.agent>;

export function createApiAgent(app: Express): ApiAgent {
  return request.agent(app);
}

export function bearerFor(actor: Actor, secret: string): string {
  return `Bearer ${signToken(
    { sub: actor.id, username: actor.username, role: actor.role },
    secret,
    3600
  )}`;
}
