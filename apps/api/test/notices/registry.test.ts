import { describe, expect, it } from "vitest";
import { NoticeRegistry } from "../../src/notices/registry.js";
import { NoticeController } from "../../src/notices/noticeController.js";
import { createDeps, operator, otherOperator } from "../support/notices.js";

describe("NoticeRegistry", () => {
  it("builds one controller per catalog entry, disabled ones included", () => {
    const registry = NoticeRegistry.fromCatalog(
      [
        { id: "welcome", content: "<p>Hi</p>", options: {} },
        { id: "", content: "<p>Orphan</p>", options: {} }
      ],
      createDeps()
    );
    expect(registry.list().map((c) => [c.id, c.enabled])).toEqual([
      ["welcome", true],
      ["", false]
    ]);
  });

  it("renders visible notices in registration order", async () => {
    const deps = createDeps();
    const registry = new NoticeRegistry();
    registry.register(
      new NoticeController("first", "<p>1</p>", { dismissible: false }, deps)
    );
    registry.register(
      new NoticeController("hidden", "<p>x</p>", { screens: ["settings"] }, deps)
    );
    registry.register(
      new NoticeController("second", "<p>2</p>", { dismissible: false, type: "error" }, deps)
    );

    expect(await registry.renderAll(operator, "dashboard")).toBe(
      [
        '<div id="notice-first" class="notice notice-info">',
        "<p>1</p>",
        "</div>",
        '<div id="notice-second" class="notice notice-error">',
        "<p>2</p>",
        "</div>"
      ].join("\n")
    );
  });

  it("returns an empty fragment when nothing applies", async () => {
    const registry = NoticeRegistry.fromCatalog(
      [{ id: "ops", content: "<p>Ops</p>", options: { capability: "manage_options" } }],
      createDeps()
    );
    expect(await registry.renderAll(operator, "dashboard")).toBe("");
  });

  it("dispatches dismiss requests so only the addressed notice reacts", async () => {
    const deps = createDeps();
    const registry = NoticeRegistry.fromCatalog(
      [
        { id: "welcome", content: "<p>Hi</p>", options: {} },
        { id: "setup", content: "<p>Setup</p>", options: { scope: "user" } }
      ],
      deps
    );

    await registry.dispatchDismiss({
      actor: operator,
      action: "dismiss_notice",
      id: "setup",
      nonce: deps.verifier.mintToken("dismiss_setup", operator.id)
    });

    const [welcome, setup] = registry.list();
    expect(await welcome.isDismissed(operator)).toBe(false);
    expect(await setup.isDismissed(operator)).toBe(true);
    expect(await setup.isDismissed(otherOperator)).toBe(false);
  });
});
