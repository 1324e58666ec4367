import type { NoticeScope } from "@dashboard-notices/shared";
import type { StateStore } from "./types.js";

export class MemoryStateStore implements StateStore {
  private readonly options: Map<string, boolean> = new Map();
  private readonly userFlags: Map<string, Map<string, boolean>> = new Map();

  async get(key: string, scope: NoticeScope, actorId?: string): Promise<boolean> {
    if (scope === "user") {
      if (!actorId) return false;
      return this.userFlags.get(actorId)?.get(key) ?? false;
    }
    return this.options.get(key) ?? false;
  }

  async set(
    key: string,
    scope: NoticeScope,
    actorId: string | undefined,
    value: boolean
  ): Promise<void> {
    if (scope === "user") {
      if (!actorId) return;
      const flags = this.userFlags.get(actorId) ?? new Map<string, boolean>();
      flags.set(key, value);
      this.userFlags.set(actorId, flags);
      return;
    }
    this.options.set(key, value);
  }
}
