import { afterEach, describe, expect, it } from "vitest";
import { inputPreview, runPipe } from "../../src/commands/pipe.js";
import { autoPrompt, codePrompt, errorPrompt } from "../../src/core/prompts.js";
import { type TestHarness, createTestContext, fakeInput } from "../helpers.js";

const TRACEBACK = [
  "Traceback (most recent call last):",
  '  File "main.py", line 1, in <module>',
  "    import requests",
  "ModuleNotFoundError: No module named 'requests'",
].join("\n");

describe("runPipe", () => {
  let h: TestHarness;

  afterEach(async () => {
    await h.cleanup();
  });

  const piped = (stdin: string) => createTestContext({ input: fakeInput({ isTTY: false, stdin }) });

  it("refuses to run without piped input", async () => {
    h = await createTestContext({ input: fakeInput({ isTTY: true }) });
    await expect(runPipe(h.ctx)).rejects.toThrow("No piped input detected.\n\nUsage: <command> | devexplain pipe");
  });

  it("rejects empty input", async () => {
    h = await piped("\n  \n");
    await expect(runPipe(h.ctx)).rejects.toThrow("Received empty input from stdin");
  });

  it("classifies a traceback and uses the error prompt", async () => {
    h = await piped(`${TRACEBACK}\n`);
    await runPipe(h.ctx);

    expect(h.stdout.text()).toContain("ℹ Detected content type: Error/Traceback\n");
    expect(h.backend.lastPrompt).toBe(errorPrompt(TRACEBACK, undefined, "English"));

    const entry = await h.ctx.history.get(1);
    expect(entry?.commandType).toBe("pipe");
    expect(entry?.query).toBe(TRACEBACK);
    expect(entry?.metadata).toEqual({ contentType: "error" });
  });

  it("uses the code prompt for code", async () => {
    h = await piped("package main\n\nfunc main() {}\n");
    await runPipe(h.ctx);
    expect(h.backend.lastPrompt).toBe(codePrompt("package main\n\nfunc main() {}", undefined, "English"));
  });

  it("uses the general prompt for anything else", async () => {
    h = await piped("total 0\n");
    await runPipe(h.ctx);

    expect(h.stdout.text()).toContain("ℹ Detected content type: General Output\n");
    expect(h.backend.lastPrompt).toBe(autoPrompt("total 0", "English"));
  });

  it("honours a forced type", async () => {
    h = await piped(TRACEBACK);
    await runPipe(h.ctx, { type: "code" });

    expect(h.stdout.text()).toContain("ℹ Detected content type: Code\n");
    expect(h.backend.lastPrompt).toBe(codePrompt(TRACEBACK, undefined, "English"));
  });

  it("rejects an unknown forced type", async () => {
    h = await piped(TRACEBACK);
    await expect(runPipe(h.ctx, { type: "log" })).rejects.toThrow(
      "Unknown content type: log\nUse one of: error, code, auto",
    );
  });

  it("stores only the first 200 characters as the query", async () => {
    h = await piped("z".repeat(450));
    await runPipe(h.ctx);
    expect((await h.ctx.history.get(1))?.query).toBe("z".repeat(200));
  });
});

describe("inputPreview", () => {
  it("returns short input unchanged", () => {
    expect(inputPreview("a\nb")).toBe("a\nb");
  });

  it("keeps 15 head and 5 tail lines of long input", () => {
    const lines = Array.from({ length: 40 }, (_, i) => `l${i + 1}`);
    expect(inputPreview(lines.join("\n"))).toBe(
      `${lines.slice(0, 15).join("\n")}\n\n... (40 lines total) ...\n\n${lines.slice(35).join("\n")}`,
    );
  });

  it("caps the preview at 500 characters", () => {
    expect(inputPreview("q".repeat(900))).toHaveLength(500);
  });
});
