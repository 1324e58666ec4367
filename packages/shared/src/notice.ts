export type NoticeType = "info" | "success" | "warning" | "error";

export type NoticeScope = "global" | "user";

export const NOTICE_TYPES: readonly NoticeType[] = ["info", "success", "warning", "error"];
export const NOTICE_SCOPES: readonly NoticeScope[] = ["global", "user"];

export type NoticeOptions = {
  dismissible: boolean;
  scope: NoticeScope;
  type: NoticeType;
  capability: string;
  optionKeyPrefix: string;
  // Empty means every screen.
  screens: readonly string[];
};

export const DEFAULT_NOTICE_OPTIONS: Readonly<NoticeOptions> = Object.freeze<NoticeOptions>({
  dismissible: true,
  scope: "global",
  type: "info",
  capability: "edit_dashboard",
  optionKeyPrefix: "wptrt_notice_dismissed",
  screens: []
});

export function isNoticeType(value: unknown): value is NoticeType {
  return NOTICE_TYPES.some((type) => type === value);
}

export function isNoticeScope(value: unknown): value is NoticeScope {
  return NOTICE_SCOPES.some((scope) => scope === value);
}

// Catalog entries arrive untyped; type and scope are narrowed on resolve.
export type NoticeOptionsInput = Partial<Omit<NoticeOptions, "type" | "scope">> & {
  type?: string;
  scope?: string;
};

export function resolveNoticeOptions(
  overrides: NoticeOptionsInput = {}
): Readonly<NoticeOptions> {
  const base = DEFAULT_NOTICE_OPTIONS;
  return Object.freeze<NoticeOptions>({
    dismissible: overrides.dismissible ?? base.dismissible,
    scope: isNoticeScope(overrides.scope) ? overrides.scope : base.scope,
    type: isNoticeType(overrides.type) ? overrides.type : base.type,
    capability: overrides.capability ?? base.capability,
    optionKeyPrefix: overrides.optionKeyPrefix ?? base.optionKeyPrefix,
    screens: Object.freeze([...(overrides.screens ?? base.screens)])
  });
}

/** Lowercases and drops anything outside `[a-z0-9_-]`. */
export function sanitizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9_-]/g, "");
}

export function buildStorageKey(prefix: string, id: string): string {
  return `${prefix}_${sanitizeKey(id)}`;
}

export function noticeClassList(options: Pick<NoticeOptions, "type" | "dismissible">) {
  const classes = ["notice", `notice-${options.type}`];
  if (options.dismissible) classes.push("is-dismissible");
  return classes.join(" ");
}

export function noticeElementId(id: string): string {
  return `notice-${id}`;
}

export function dismissNonceScope(id: string): string {
  return `dismiss_${id}`;
}

export const DISMISS_NOTICE_ACTION = "dismiss_notice";
