import type { Request, Response, NextFunction } from "express";
import { unauthorizedError } from "../errors.js";
import { type Actor, normalizeActorRole } from "./capabilities.js";
import { type TokenClaims, verifyToken } from "./token.js";

export type AuthedRequest = Request & { auth?: TokenClaims };

function parseCookies(header: string | undefined): Record<string, string> {
  if (!header) return {};
  return header.split(";").reduce<Record<string, string>>((acc, part) => {
    const [k, ...rest] = part.split("=");
    if (!k) return acc;
    const key = k.trim();
    if (!key) return acc;
    acc[key] = rest.join("=").trim();
    return acc;
  }, {});
}

function extractToken(req: Request): string | null {
  const header = req.headers.authorization ?? "";
  if (header.startsWith("Bearer ")) return header.slice("Bearer ".length);
  const cookies = parseCookies(req.headers.cookie);
  if (cookies.auth_token) return cookies.auth_token;
  return null;
}

export function actorFromClaims(claims: TokenClaims): Actor {
  return {
    id: claims.sub,
    username: claims.username,
    role: normalizeActorRole(claims.role)
  };
}

export function requireAuth(secret: string) {
  return (req: AuthedRequest, _res: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (!token) {
      return next(unauthorizedError());
    }
    try {
      req.auth = verifyToken(token, secret);
      return next();
    } catch (err) {
      return next(err);
    }
  };
}

export const authUtils = {
  extractToken,
  parseCookies
};
