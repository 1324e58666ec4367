import { describe, expect, it, vi } from "vitest";
import type { DbClient } from "../../src/data/db.js";
import { MemoryStateStore } from "../../src/notices/memoryStateStore.js";
import { PgStateStore } from "../../src/notices/pgStateStore.js";

function fakeClient(rows: Array<{ value: boolean }> = []) {
  const queryFn = vi.fn(async (_text: string, _params: unknown[]) => ({ rows }));
  return { client: { query: queryFn } as unknown as DbClient, queryFn };
}

describe("MemoryStateStore", () => {
  it("reads false until a flag is written", async () => {
    const store = new MemoryStateStore();
    expect(await store.get("k", "global")).toBe(false);
    await store.set("k", "global", undefined, true);
    expect(await store.get("k", "global")).toBe(true);
  });

  it("keeps user flags apart from each other and from global flags", async () => {
    const store = new MemoryStateStore();
    await store.set("k", "user", "1", true);

    expect(await store.get("k", "user", "1")).toBe(true);
    expect(await store.get("k", "user", "2")).toBe(false);
    expect(await store.get("k", "global")).toBe(false);
  });

  it("ignores user-scoped calls without an actor id", async () => {
    const store = new MemoryStateStore();
    await store.set("k", "user", undefined, true);
    expect(await store.get("k", "user")).toBe(false);
    expect(await store.get("k", "global")).toBe(false);
  });
});

describe("PgStateStore", () => {
  it("reads global flags from notice_option", async () => {
    const { client, queryFn } = fakeClient([{ value: true }]);
    const store = new PgStateStore(client);

    expect(await store.get("wptrt_notice_dismissed_welcome", "global")).toBe(true);
    const [text, params] = queryFn.mock.calls[0];
    expect(text).toContain("FROM notice_option");
    expect(params).toEqual(["wptrt_notice_dismissed_welcome"]);
  });

  it("reads user flags from notice_user_flag", async () => {
    const { client, queryFn } = fakeClient([]);
    const store = new PgStateStore(client);

    expect(await store.get("wptrt_notice_dismissed_setup", "user", "7")).toBe(false);
    const [text, params] = queryFn.mock.calls[0];
    expect(text).toContain("FROM notice_user_flag");
    expect(params).toEqual(["7", "wptrt_notice_dismissed_setup"]);
  });

  it("upserts flags into the table matching the scope", async () => {
    const { client, queryFn } = fakeClient();
    const store = new PgStateStore(client);

    await store.set("global_key", "global", "7", true);
    await store.set("user_key", "user", "7", true);

    expect(queryFn).toHaveBeenCalledTimes(2);
    const [globalText, globalParams] = queryFn.mock.calls[0];
    const [userText, userParams] = queryFn.mock.calls[1];
    expect(globalText).toContain("INSERT INTO notice_option");
    expect(globalText).toContain("ON CONFLICT (option_key)");
    expect(globalParams).toEqual(["global_key", true]);
    expect(userText).toContain("INSERT INTO notice_user_flag");
    expect(userText).toContain("ON CONFLICT (user_id, option_key)");
    expect(userParams).toEqual(["7", "user_key", true]);
  });

  it("skips the database for user scope without an actor id", async () => {
    const { client, queryFn } = fakeClient([{ value: true }]);
    const store = new PgStateStore(client);

    expect(await store.get("k", "user")).toBe(false);
    await store.set("k", "user", undefined, true);
    expect(queryFn).not.toHaveBeenCalled();
  });
});
