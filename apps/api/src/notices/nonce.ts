import crypto from "crypto";
import { safeEqual } from "../auth/token.js";
import type { RequestVerifier } from "./types.js";

export type NonceOptions = {
  secret: string;
  lifetimeSeconds: number;
  now?: () => number; // ms since epoch
};

const NONCE_LENGTH = 20;

/**
 * Stateless anti-forgery tokens. A token is an HMAC over the current tick
 * (half the lifetime), the scope and the actor id, so it stays valid for
 * between half and the full lifetime.
 */
export class HmacNonceVerifier implements RequestVerifier {
  private readonly secret: string;
  private readonly halfLifeSeconds: number;
  private readonly now: () => number;

  constructor(options: NonceOptions) {
    this.secret = options.secret;
    this.halfLifeSeconds = Math.max(1, Math.floor(options.lifetimeSeconds / 2));
    this.now = options.now ?? Date.now;
  }

  tick(): number {
    return Math.ceil(this.now() / 1000 / this.halfLifeSeconds);
  }

  mintToken(scope: string, actorId: string): string {
    return this.hash(this.tick(), scope, actorId);
  }

  verifyToken(token: string, scope: string, actorId: string): boolean {
    if (!token || token.length !== NONCE_LENGTH) return false;
    const tick = this.tick();
    return [tick, tick - 1].some((t) => safeEqual(token, this.hash(t, scope, actorId)));
  }

  private hash(tick: number, scope: string, actorId: string): string {
    return crypto
      .createHmac("sha256", this.secret)
      .update(`${tick}|${scope}|${actorId}`)
      .digest("hex")
      .slice(0, NONCE_LENGTH);
  }
}
