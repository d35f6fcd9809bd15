import { existsSync, readFileSync } from "node:fs";
import "dotenv/config";
import { z } from "zod";
import { AppPaths } from "./storage/paths.js";
import { ConfigError } from "./utils/errors.js";

export const SUPPORTED_LANGS = ["en", "vi", "zh", "ja", "ko", "es", "fr", "de", "pt", "ru"] as const;

export type SupportedLang = (typeof SUPPORTED_LANGS)[number];

export const LANGUAGE_NAMES: Record<SupportedLang, string> = {
	en: "English",
	vi: "Tiếng Việt",
	zh: "中文",
	ja: "日本語",
	ko: "한국어",
	es: "Español",
	fr: "Français",
	de: "Deutsch",
	pt: "Português",
	ru: "Русский",
};

export function isSupportedLang(lang: string): lang is SupportedLang {
	return SUPPORTED_LANGS.some((code) => code === lang);
}

export const DEFAULT_LANGUAGE: SupportedLang = "en";

export const DEFAULT_MODEL = "openai/gpt-4o-mini";

/** Known model ids and a one-line description. Any other id is passed through as-is. */
export const AVAILABLE_MODELS: Record<string, string> = {
	"openai/gpt-4o-mini": "Fast & affordable (default)",
	"openai/gpt-4o": "Most capable GPT-4o",
	"openai/gpt-4.1": "Latest GPT-4.1",
	"openai/gpt-4.1-mini": "GPT-4.1 mini, fast",
	"openai/gpt-4.1-nano": "GPT-4.1 nano, fastest",
	"openai/o4-mini": "Reasoning model (o4-mini)",
	"meta/llama-4-scout-17b-16e-instruct": "Llama 4 Scout 17B",
	"meta/llama-4-maverick-17b-128e-instruct-fp8": "Llama 4 Maverick 17B",
	"mistralai/mistral-small-2503": "Mistral Small",
	"deepseek/DeepSeek-R1": "DeepSeek R1 (reasoning)",
	"cohere/cohere-command-a": "Cohere Command A",
};

export interface DevExplainConfig {
	/** Output language code. Validated per command, so an env typo surfaces as a user error. */
	language: string;
	model: string;
	verbose: boolean;

	config_dir: string;
	cache_dir: string;
	config_file: string;
	history_file: string;

	/** Shell history file override (HISTFILE) */
	shell_history_file?: string;
}

const FileConfigSchema = z.object({
	language: z.string().optional(),
	model: z.string().optional(),
	verbose: z.boolean().optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

const DEFAULTS = {
	language: DEFAULT_LANGUAGE,
	model: DEFAULT_MODEL,
	verbose: false,
};

/**
 * Build the configuration for one invocation.
 * Precedence: environment, then <config_dir>/config.json, then defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DevExplainConfig {
	const paths = AppPaths.fromEnv(env);
	const fileConfig = readConfigFile(paths.configFile);

	const config: DevExplainConfig = {
		language: fileConfig.language ?? DEFAULTS.language,
		model: fileConfig.model ?? DEFAULTS.model,
		verbose: fileConfig.verbose ?? DEFAULTS.verbose,
		config_dir: paths.configRoot,
		cache_dir: paths.cacheRoot,
		config_file: paths.configFile,
		history_file: paths.historyFile,
	};

	if (env.DEVEXPLAIN_LANG) {
		config.language = env.DEVEXPLAIN_LANG;
	}
	if (env.DEVEXPLAIN_MODEL) {
		config.model = env.DEVEXPLAIN_MODEL;
	}
	if (env.DEVEXPLAIN_VERBOSE !== undefined) {
		config.verbose = env.DEVEXPLAIN_VERBOSE.toLowerCase() === "true";
	}
	if (env.HISTFILE) {
		config.shell_history_file = env.HISTFILE;
	}

	return config;
}

function readConfigFile(filePath: string): FileConfig {
	if (!existsSync(filePath)) return {};

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Cannot read config file ${filePath}`, err);
	}

	const result = FileConfigSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
		throw new ConfigError(`Invalid config file ${filePath}: ${issues.join("; ")}`);
	}
	return result.data;
}
