import crypto from "crypto";
import { AppError } from "../errors.js";
import { type ActorRole, normalizeActorRole } from "./capabilities.js";

export type TokenClaims = {
  sub: string;
  username: string;
  role?: ActorRole;
  exp?: number; // unix seconds
};

function base64url(input: Buffer | string): string {
  return Buffer.from(input).toString("base64url");
}

function parseBase64url(input: string): Buffer {
  return Buffer.from(input, "base64url");
}

function sign(data: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(data).digest("base64url");
}

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function signToken(
  claims: TokenClaims,
  secret: string,
  expiresInSeconds = 60 * 60
) {
  const header = { alg: "HS256", typ: "JWT" };
  const exp = Math.floor(Date.now() / 1000) + expiresInSeconds;
  const payload = { ...claims, role: normalizeActorRole(claims.role), exp };
  const encodedHeader = base64url(JSON.stringify(header));
  const encodedPayload = base64url(JSON.stringify(payload));
  const data = `${encodedHeader}.${encodedPayload}`;
  return `${data}.${sign(data, secret)}`;
}

function parsePayload(encoded: string): unknown {
  try {
    return JSON.parse(parseBase64url(encoded).toString("utf8"));
  } catch {
    throw new AppError("INVALID_TOKEN", 401, "Invalid token");
  }
}

export function verifyToken(token: string, secret: string): TokenClaims {
  const parts = token.split(".");
  if (parts.length !== 3) throw new AppError("INVALID_TOKEN", 401, "Invalid token");
  const [encodedHeader, encodedPayload, signature] = parts;
  const data = `${encodedHeader}.${encodedPayload}`;
  if (!safeEqual(signature, sign(data, secret))) {
    throw new AppError("INVALID_TOKEN", 401, "Invalid token");
  }
  const payload = parsePayload(encodedPayload);
  if (
    !payload ||
    typeof payload !== "object" ||
    !("sub" in payload) ||
    typeof payload.sub !== "string" ||
    !payload.sub
  ) {
    throw new AppError("INVALID_TOKEN", 401, "Invalid token");
  }
  const username =
    "username" in payload && typeof payload.username === "string" ? payload.username : "";
  const exp = "exp" in payload && typeof payload.exp === "number" ? payload.exp : undefined;
  if (exp && exp < Math.floor(Date.now() / 1000)) {
    throw new AppError("TOKEN_EXPIRED", 401, "Token expired");
  }
  return {
    sub: payload.sub,
    username,
    role: normalizeActorRole("role" in payload ? payload.role : undefined),
    exp
  };
}
