import {
  DISMISS_NOTICE_ACTION,
  noticeClassList,
  noticeElementId
} from "@dashboard-notices/shared";
import type { NoticeRenderer, NoticeView } from "./types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;"
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** RFC 3986 percent-encoding; also encodes `!'()*`. */
export function rawUrlEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

// JSON string literal that cannot close the surrounding <script> element.
export function toScriptString(value: string): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function buildDismissPostData(id: string, nonce: string): string {
  return `id=${rawUrlEncode(id)}&action=${DISMISS_NOTICE_ACTION}&nonce=${rawUrlEncode(nonce)}`;
}

function renderDismissScript(view: NoticeView, nonce: string): string {
  return [
    "<script>",
    'window.addEventListener("load", function () {',
    `  var notice = document.getElementById(${toScriptString(noticeElementId(view.id))});`,
    "  var dismissBtn = notice ? notice.querySelector(\".notice-dismiss\") : null;",
    "  if (!dismissBtn) return;",
    '  dismissBtn.addEventListener("click", function () {',
    "    var httpRequest = new XMLHttpRequest();",
    `    var postData = ${toScriptString(buildDismissPostData(view.id, nonce))};`,
    `    httpRequest.open("POST", ${toScriptString(view.dismissUrl)});`,
    '    httpRequest.setRequestHeader("Content-Type", "application/x-www-form-urlencoded");',
    "    httpRequest.send(postData);",
    "    if (notice.parentNode) notice.parentNode.removeChild(notice);",
    "  });",
    "});",
    "</script>"
  ].join("\n");
}

export const renderNotice: NoticeRenderer = (view) => {
  const elementId = escapeHtml(noticeElementId(view.id));
  const classes = escapeHtml(noticeClassList(view));
  const lines = [`<div id="${elementId}" class="${classes}">`, view.content];
  const nonce = view.dismissible ? view.nonce : undefined;
  if (nonce !== undefined) {
    lines.push(
      '<button type="button" class="notice-dismiss"><span class="screen-reader-text">Dismiss this notice.</span></button>'
    );
  }
  lines.push("</div>");
  if (nonce !== undefined) {
    lines.push(renderDismissScript(view, nonce));
  }
  return lines.join("\n");
};
