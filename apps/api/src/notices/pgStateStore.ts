import type { NoticeScope } from "@dashboard-notices/shared";
import type { DbClient } from "../data/db.js";
import {
  getNoticeOption,
  getUserNoticeFlag,
  setNoticeOption,
  setUserNoticeFlag
} from "../data/repositories/noticeStateRepository.js";
import type { StateStore } from "./types.js";

export class PgStateStore implements StateStore {
  constructor(private readonly client: DbClient) {}

  async get(key: string, scope: NoticeScope, actorId?: string): Promise<boolean> {
    if (scope === "user") {
      if (!actorId) return false;
      return getUserNoticeFlag(this.client, actorId, key);
    }
    return getNoticeOption(this.client, key);
  }

  async set(
    key: string,
    scope: NoticeScope,
    actorId: string | undefined,
    value: boolean
  ): Promise<void> {
    if (scope === "user") {
      if (!actorId) return;
      await setUserNoticeFlag(this.client, actorId, key, value);
      return;
    }
    await setNoticeOption(this.client, key, value);
  }
}
