import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { highlightLine, renderInline, renderMarkdown } from "../src/ui/markdown.js";
import { Renderer, stripAnsi } from "../src/ui/renderer.js";
import { captureStream } from "./helpers.js";

const plain = new Chalk({ level: 0 });

describe("renderMarkdown", () => {
  it("flattens block markdown to terminal text", () => {
    const md = ["# Title", "- item **b**", "1. step", "```bash", "echo hi", "```", "> quote"].join("\n");
    expect(renderMarkdown(md, plain)).toBe("Title\n• item b\n1. step\n│ echo hi\n│ quote");
  });

  it("renders inline code and links", () => {
    expect(renderInline("run `npm i`, see [docs](https://docs.example.test)", plain)).toBe(
      "run npm i, see docs (https://docs.example.test)",
    );
  });

  it("keeps quoted strings intact inside comments", () => {
    expect(highlightLine('x = 1  # say "hi"', "py", plain)).toBe('x = 1  # say "hi"');
  });

  it("styles keywords when color is on", () => {
    const colored = new Chalk({ level: 1 });
    const line = highlightLine("const a = 'b';", "js", colored);
    expect(line).not.toBe("const a = 'b';");
    expect(stripAnsi(line)).toBe("const a = 'b';");
  });
});

describe("Renderer", () => {
  const make = () => {
    const stdout = captureStream();
    const stderr = captureStream();
    return { stdout, stderr, renderer: new Renderer({ color: false, stdout, stderr, width: 20 }) };
  };

  it("writes errors to stderr, one indented line each", () => {
    const { stdout, stderr, renderer } = make();
    renderer.printError("first\nsecond", "Backend Error");

    expect(stderr.text()).toBe("\n✗ Backend Error\n  first\n  second\n");
    expect(stdout.text()).toBe("");
  });

  it("frames explanations with titled rules", () => {
    const { stdout, renderer } = make();
    renderer.printExplanation("**Done**", "Result", "sub");

    expect(stdout.text()).toBe(`\n── Result ${"─".repeat(10)}\nDone\n── sub ${"─".repeat(13)}\n`);
  });

  it("clips table cells to their column width", () => {
    const { stdout, renderer } = make();
    renderer.printTable("T", [{ header: "Name", width: 5 }, { header: "N", width: 3, align: "right" }], [["abcdefgh", "7"]]);

    expect(stdout.text()).toBe("T\nName    N\nabcd…   7\n");
  });
});
