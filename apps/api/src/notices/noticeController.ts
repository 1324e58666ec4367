import {
  DISMISS_NOTICE_ACTION,
  type NoticeOptions,
  type NoticeOptionsInput,
  buildStorageKey,
  dismissNonceScope,
  resolveNoticeOptions
} from "@dashboard-notices/shared";
import { log } from "../logger.js";
import { renderNotice } from "./renderer.js";
import type {
  Actor,
  Authorizer,
  DismissRequest,
  NoticeRenderer,
  RequestVerifier,
  StateStore
} from "./types.js";

export type NoticeControllerDeps = {
  authorizer: Authorizer;
  store: StateStore;
  verifier: RequestVerifier;
  dismissUrl: string;
  renderer?: NoticeRenderer;
};

/**
 * Gates and renders one notice and reacts to dismiss requests addressed to it.
 *
 * A controller built with an empty id or content stays registered but every
 * operation is a no-op, so a misconfigured notice never breaks the page.
 */
export class NoticeController {
  readonly id: string;
  readonly storageKey: string;
  readonly options: Readonly<NoticeOptions>;
  readonly enabled: boolean;
  private readonly content: string;
  private readonly deps: NoticeControllerDeps;
  private readonly renderer: NoticeRenderer;

  constructor(
    id: string,
    content: string,
    overrides: NoticeOptionsInput,
    deps: NoticeControllerDeps
  ) {
    this.id = id;
    this.content = content;
    this.options = resolveNoticeOptions(overrides);
    this.storageKey = buildStorageKey(this.options.optionKeyPrefix, id);
    this.enabled = Boolean(id) && Boolean(content);
    this.deps = deps;
    this.renderer = deps.renderer ?? renderNotice;
  }

  isScreen(context: string): boolean {
    const { screens } = this.options;
    return screens.length === 0 || screens.includes(context);
  }

  async isDismissed(actor: Actor): Promise<boolean> {
    if (!this.enabled || !this.options.dismissible) return false;
    const actorId = this.options.scope === "user" ? actor.id : undefined;
    return this.deps.store.get(this.storageKey, this.options.scope, actorId);
  }

  async shouldRender(actor: Actor, context: string): Promise<boolean> {
    if (!this.enabled) return false;
    if (!this.deps.authorizer.can(actor, this.options.capability)) return false;
    if (!this.isScreen(context)) return false;
    return !(await this.isDismissed(actor));
  }

  async render(actor: Actor, context: string): Promise<string> {
    if (!(await this.shouldRender(actor, context))) return "";
    const { type, dismissible } = this.options;
    return this.renderer({
      id: this.id,
      content: this.content,
      type,
      dismissible,
      dismissUrl: this.deps.dismissUrl,
      nonce: dismissible
        ? this.deps.verifier.mintToken(dismissNonceScope(this.id), actor.id)
        : undefined
    });
  }

  async handleDismissRequest(request: DismissRequest): Promise<void> {
    if (!this.enabled) return;
    if (request.action !== DISMISS_NOTICE_ACTION) return;
    // Every registered notice sees every request; only the addressed one reacts.
    if (request.id !== this.id) return;

    const nonce = request.nonce ?? "";
    const scope = dismissNonceScope(this.id);
    if (!this.deps.verifier.verifyToken(nonce, scope, request.actor.id)) {
      log({
        level: "info",
        msg: "notice_dismiss_rejected",
        notice_id: this.id,
        user_id: request.actor.id,
        reason: "invalid_nonce"
      });
      return;
    }

    const actorId = this.options.scope === "user" ? request.actor.id : undefined;
    await this.deps.store.set(this.storageKey, this.options.scope, actorId, true);
    log({
      level: "info",
      msg: "notice_dismissed",
      notice_id: this.id,
      user_id: request.actor.id,
      scope: this.options.scope
    });
  }
}
