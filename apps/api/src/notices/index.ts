export { NoticeController, type NoticeControllerDeps } from "./noticeController.js";
export { NoticeRegistry } from "./registry.js";
export { MemoryStateStore } from "./memoryStateStore.js";
export { PgStateStore } from "./pgStateStore.js";
export { HmacNonceVerifier } from "./nonce.js";
export { renderNotice } from "./renderer.js";
export { loadNoticeCatalog, parseNoticeCatalog, type NoticeCatalogEntry } from "./catalog.js";
export { resolveScreen, type ContextResolver } from "./context.js";
export type * from "./types.js";
