import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_MODEL, isSupportedLang, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/utils/errors.js";
import { makeTempDir } from "./helpers.js";

describe("loadConfig", () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await makeTempDir();
    env = {
      DEVEXPLAIN_CONFIG_DIR: path.join(dir, "config"),
      DEVEXPLAIN_CACHE_DIR: path.join(dir, "cache"),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeConfigFile = async (content: string) => {
    await fs.mkdir(path.join(dir, "config"), { recursive: true });
    await fs.writeFile(path.join(dir, "config", "config.json"), content, "utf-8");
  };

  it("uses defaults and the overridden directories", () => {
    expect(loadConfig(env)).toEqual({
      language: "en",
      model: DEFAULT_MODEL,
      verbose: false,
      config_dir: path.join(dir, "config"),
      cache_dir: path.join(dir, "cache"),
      config_file: path.join(dir, "config", "config.json"),
      history_file: path.join(dir, "cache", "history.json"),
    });
  });

  it("reads the config file", async () => {
    await writeConfigFile(JSON.stringify({ language: "ja", model: "openai/gpt-4o", verbose: true }));
    const config = loadConfig(env);

    expect(config.language).toBe("ja");
    expect(config.model).toBe("openai/gpt-4o");
    expect(config.verbose).toBe(true);
  });

  it("lets the environment override the file", async () => {
    await writeConfigFile(JSON.stringify({ language: "ja", verbose: true }));
    const config = loadConfig({
      ...env,
      DEVEXPLAIN_LANG: "fr",
      DEVEXPLAIN_MODEL: "meta/llama-4-scout-17b-16e-instruct",
      DEVEXPLAIN_VERBOSE: "false",
      HISTFILE: "/tmp/hist",
    });

    expect(config.language).toBe("fr");
    expect(config.model).toBe("meta/llama-4-scout-17b-16e-instruct");
    expect(config.verbose).toBe(false);
    expect(config.shell_history_file).toBe("/tmp/hist");
  });

  it("accepts only the literal true for DEVEXPLAIN_VERBOSE", () => {
    expect(loadConfig({ ...env, DEVEXPLAIN_VERBOSE: "TRUE" }).verbose).toBe(true);
    expect(loadConfig({ ...env, DEVEXPLAIN_VERBOSE: "1" }).verbose).toBe(false);
  });

  it("keeps an unsupported language for commands to reject", () => {
    expect(loadConfig({ ...env, DEVEXPLAIN_LANG: "xx" }).language).toBe("xx");
  });

  it("rejects a config file that is not JSON", async () => {
    await writeConfigFile("language = en");
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });

  it("rejects a config file with wrong types", async () => {
    await writeConfigFile(JSON.stringify({ verbose: "yes" }));
    expect(() => loadConfig(env)).toThrow(/^Invalid config file .*config\.json: verbose: Expected boolean, received string$/);
  });
});

describe("isSupportedLang", () => {
  it("knows the ten response languages", () => {
    expect(["en", "vi", "zh", "ja", "ko", "es", "fr", "de", "pt", "ru"].every(isSupportedLang)).toBe(true);
    expect(isSupportedLang("xx")).toBe(false);
    expect(isSupportedLang("EN")).toBe(false);
  });
});
