import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runHistory } from "../../src/commands/history.js";
import { formatEntryTime } from "../../src/storage/history.js";
import { type TestHarness, createTestContext } from "../helpers.js";

describe("runHistory", () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createTestContext();
  });

  afterEach(async () => {
    await h.cleanup();
  });

  const seed = async () => {
    await h.ctx.history.add("cmd", "docker ps", "Lists running containers");
    await h.ctx.history.add("error", "EADDRINUSE :3000", "Port 3000 is taken", "ja");
  };

  it("says so when there is nothing to list", async () => {
    await runHistory(h.ctx, {});
    expect(h.stdout.text()).toBe("ℹ No history entries found.\n");
  });

  it("suggests another term when a search finds nothing", async () => {
    await seed();
    await runHistory(h.ctx, { search: "kubectl" });
    expect(h.stdout.text()).toBe(
      "ℹ No history entries found.\nℹ Try a different search term or remove the filter.\n",
    );
  });

  it("lists entries newest first", async () => {
    await seed();
    // Both entries share the fixed test clock
    const newest = await h.ctx.history.get(1);
    const time = newest ? formatEntryTime(newest) : "";
    await runHistory(h.ctx, { limit: 20 });

    const lines = h.stdout.text().split("\n");
    expect(lines).toContain("Explanation History");
    expect(lines).toContain(`   1 ${time} error  🇯🇵 EADDRINUSE :3000`);
    expect(lines).toContain(`   2 ${time} cmd    🇺🇸 docker ps`);
    expect(lines).toContain("Showing 2 of 2 total entries");
  });

  it("filters by type and search", async () => {
    await seed();
    await runHistory(h.ctx, { type: "cmd" });
    expect(h.stdout.text()).toContain("Showing 1 of 2 total entries\n");
    expect(h.stdout.text()).not.toContain("EADDRINUSE");
  });

  it("rejects an unknown type", async () => {
    await expect(runHistory(h.ctx, { type: "bogus" })).rejects.toThrow(
      "Unknown history type: bogus\nKnown types: cmd, error, code, diff, pipe, chat, wtf",
    );
  });

  it("shows one entry in full", async () => {
    await seed();
    await runHistory(h.ctx, { show: 2 });

    const out = h.stdout.text();
    expect(out).toContain("History Entry #2\n");
    expect(out).toContain("Type:     cmd\n");
    expect(out).toContain("Language: 🇺🇸 en\n");
    expect(out).toContain("Query:    docker ps\n");
    expect(out).toContain("── Explanation (cmd) ");
    expect(out).toContain("Lists running containers");
  });

  it("rejects an unknown position", async () => {
    await seed();
    await expect(runHistory(h.ctx, { show: 5 })).rejects.toThrow("No history entry at position 5");
  });

  it("clears and reports the count", async () => {
    await seed();
    await runHistory(h.ctx, { clear: true });

    expect(h.stdout.text()).toBe("✓ Cleared 2 history entries\n");
    expect(await h.ctx.history.count()).toBe(0);
  });
});
