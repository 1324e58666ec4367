import type { NoticeScope, NoticeType } from "@dashboard-notices/shared";
import type { Actor } from "../auth/capabilities.js";

export type { Actor };

export interface Authorizer {
  can(actor: Actor, capability: string): boolean;
}

/**
 * Dismissed-flag persistence. `global` flags ignore the actor id; `user`
 * flags are keyed by (key, actorId) and read as `false` without one.
 */
export interface StateStore {
  get(key: string, scope: NoticeScope, actorId?: string): Promise<boolean>;
  set(
    key: string,
    scope: NoticeScope,
    actorId: string | undefined,
    value: boolean
  ): Promise<void>;
}

export interface RequestVerifier {
  mintToken(scope: string, actorId: string): string;
  verifyToken(token: string, scope: string, actorId: string): boolean;
}

export type DismissRequest = {
  actor: Actor;
  action?: string;
  id?: string;
  nonce?: string;
};

export type NoticeView = {
  id: string;
  content: string;
  type: NoticeType;
  dismissible: boolean;
  dismissUrl: string;
  // Present only for dismissible notices.
  nonce?: string;
};

export type NoticeRenderer = (view: NoticeView) => string;
