import fs from "fs";
import {
  type NoticeOptionsInput,
  isNoticeScope,
  isNoticeType
} from "@dashboard-notices/shared";
import { validationError } from "../errors.js";

export type NoticeCatalogEntry = {
  id: string;
  content: string;
  options: NoticeOptionsInput;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function parseEntry(
  raw: unknown,
  path: string,
  issues: string[]
): NoticeCatalogEntry | null {
  if (!isRecord(raw)) {
    issues.push(path);
    return null;
  }
  const { id, content, dismissible, scope, type, capability, optionKeyPrefix, screens } =
    raw;
  const options: NoticeOptionsInput = {};

  if (typeof id !== "string") issues.push(`${path}.id`);
  if (typeof content !== "string") issues.push(`${path}.content`);

  if (dismissible !== undefined) {
    if (typeof dismissible === "boolean") options.dismissible = dismissible;
    else issues.push(`${path}.dismissible`);
  }
  if (scope !== undefined) {
    if (isNoticeScope(scope)) options.scope = scope;
    else issues.push(`${path}.scope`);
  }
  if (type !== undefined) {
    if (isNoticeType(type)) options.type = type;
    else issues.push(`${path}.type`);
  }
  if (capability !== undefined) {
    if (typeof capability === "string" && capability.trim()) options.capability = capability;
    else issues.push(`${path}.capability`);
  }
  if (optionKeyPrefix !== undefined) {
    if (typeof optionKeyPrefix === "string" && optionKeyPrefix.trim()) {
      options.optionKeyPrefix = optionKeyPrefix;
    } else issues.push(`${path}.optionKeyPrefix`);
  }
  if (screens !== undefined) {
    if (isStringArray(screens)) options.screens = screens;
    else issues.push(`${path}.screens`);
  }

  if (typeof id !== "string" || typeof content !== "string") return null;
  return { id, content, options };
}

export function parseNoticeCatalog(raw: unknown): NoticeCatalogEntry[] {
  if (!Array.isArray(raw)) {
    throw validationError("Notice catalog must be an array", ["notices"]);
  }
  const issues: string[] = [];
  const entries: NoticeCatalogEntry[] = [];
  raw.forEach((item, index) => {
    const entry = parseEntry(item, `notices[${index}]`, issues);
    if (entry) entries.push(entry);
  });
  if (issues.length) {
    throw validationError("Invalid notice catalog", issues);
  }
  return entries;
}

export function loadNoticeCatalog(filePath: string): NoticeCatalogEntry[] {
  const text = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw validationError(
      `Notice catalog is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      ["notices"]
    );
  }
  return parseNoticeCatalog(raw);
}
