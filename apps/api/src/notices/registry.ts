import { NoticeController, type NoticeControllerDeps } from "./noticeController.js";
import type { NoticeCatalogEntry } from "./catalog.js";
import type { Actor, DismissRequest } from "./types.js";

// Stands in for the host's render and dismiss hooks.
export class NoticeRegistry {
  private readonly controllers: NoticeController[] = [];

  static fromCatalog(
    entries: NoticeCatalogEntry[],
    deps: NoticeControllerDeps
  ): NoticeRegistry {
    const registry = new NoticeRegistry();
    for (const entry of entries) {
      registry.register(new NoticeController(entry.id, entry.content, entry.options, deps));
    }
    return registry;
  }

  register(controller: NoticeController): NoticeController {
    this.controllers.push(controller);
    return controller;
  }

  list(): readonly NoticeController[] {
    return this.controllers;
  }

  async renderAll(actor: Actor, context: string): Promise<string> {
    const parts: string[] = [];
    for (const controller of this.controllers) {
      const markup = await controller.render(actor, context);
      if (markup) parts.push(markup);
    }
    return parts.join("\n");
  }

  async dispatchDismiss(request: DismissRequest): Promise<void> {
    for (const controller of this.controllers) {
      await controller.handleDismissRequest(request);
    }
  }
}
