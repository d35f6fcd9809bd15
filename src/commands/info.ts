import { AVAILABLE_MODELS, LANGUAGE_NAMES, SUPPORTED_LANGS, isSupportedLang } from "../config.js";
import type { RunContext } from "../core/context.js";
import { languageLabel } from "../core/explain.js";
import { languageFlag } from "../ui/languages.js";
import { BackendNotAvailableError, ValidationError } from "../utils/errors.js";
import { packageVersion } from "../version.js";

const PROBE_TIMEOUT_MS = 10_000;

/** Backend display name, or null when no credential resolves. */
async function backendName(ctx: RunContext): Promise<string | null> {
  try {
    return (await ctx.backends.getBackend()).name;
  } catch (err) {
    if (err instanceof BackendNotAvailableError) return null;
    throw err;
  }
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}

/** devexplain check */
export async function runCheck(ctx: RunContext): Promise<void> {
  const { renderer, runner } = ctx;

  renderer.printBanner();
  renderer.line(renderer.c.bold("Checking dependencies..."));
  renderer.line();

  const gh = await runner.execute("gh --version", PROBE_TIMEOUT_MS);
  if (gh.exitCode === 0) {
    renderer.printSuccess(`GitHub CLI: ${firstLine(gh.stdout)}`);
    const auth = await runner.execute("gh auth status", PROBE_TIMEOUT_MS);
    if (auth.exitCode === 0) {
      renderer.printSuccess("GitHub CLI: authenticated");
    } else {
      renderer.printWarning("GitHub CLI: not authenticated (run: gh auth login)");
    }
  } else {
    renderer.printWarning("GitHub CLI: not installed (https://cli.github.com)");
  }

  const backend = await backendName(ctx);
  if (backend) {
    renderer.printSuccess(`AI Backend: ${backend}`);
  } else {
    renderer.printWarning("AI Backend: not available");
  }
  renderer.printInfo(`Model: ${ctx.backends.currentModel}`);

  const git = await runner.execute("git --version", PROBE_TIMEOUT_MS);
  if (git.exitCode === 0) {
    renderer.printSuccess(`Git: ${firstLine(git.stdout)}`);
  } else {
    renderer.printWarning("Git: not installed (needed for devexplain diff)");
  }

  renderer.line();
  if (backend) {
    renderer.printSuccess('Ready! Try: devexplain cmd "ls -la"');
  } else {
    renderer.printWarning("Set GH_TOKEN or run `gh auth login` to enable explanations");
  }
}

export interface ConfigOptions {
  /** Print the shell line that makes this the default language */
  lang?: string;
}

/** devexplain config [--lang xx] */
export async function runConfig(ctx: RunContext, opts: ConfigOptions = {}): Promise<void> {
  const { config, renderer } = ctx;
  const { c } = renderer;

  if (opts.lang !== undefined) {
    if (!isSupportedLang(opts.lang)) {
      throw new ValidationError(`Unsupported language: ${opts.lang}\nAvailable: ${SUPPORTED_LANGS.join(", ")}`);
    }
    renderer.printSuccess(`To set default language to ${languageLabel(opts.lang)}:`);
    renderer.line(`  export DEVEXPLAIN_LANG=${opts.lang}`);
    renderer.line(c.dim("Add this to your ~/.bashrc or ~/.zshrc"));
    return;
  }

  const language = isSupportedLang(config.language)
    ? languageLabel(config.language)
    : `${config.language} (unsupported)`;

  renderer.line();
  renderer.printTable(
    "Configuration",
    [
      { header: "Setting", width: 14, style: c.cyan },
      { header: "Value", width: 70 },
    ],
    [
      ["Language", language],
      ["Model", ctx.backends.currentModel],
      ["Verbose", String(config.verbose)],
      ["Config file", config.config_file],
      ["Config dir", config.config_dir],
      ["Cache dir", config.cache_dir],
      ["History file", config.history_file],
    ],
  );

  renderer.line();
  renderer.line(c.bold("Available languages:"));
  for (const lang of SUPPORTED_LANGS) {
    const marker = lang === config.language ? c.green(" (current)") : "";
    renderer.line(`  ${languageFlag(lang)} ${lang}  ${LANGUAGE_NAMES[lang]}${marker}`);
  }
}

/** devexplain models */
export async function runModels(ctx: RunContext): Promise<void> {
  const { renderer } = ctx;
  const { c } = renderer;
  const current = ctx.backends.currentModel;

  const rows = Object.entries(AVAILABLE_MODELS).map(([id, description]) => [
    id === current ? "●" : "",
    id,
    description,
  ]);

  renderer.line();
  renderer.printTable(
    "Available Models",
    [
      { header: "", width: 1, style: c.green },
      { header: "Model", width: 44, style: c.cyan },
      { header: "Description", width: 30 },
    ],
    rows,
  );
  renderer.line();
  renderer.line(c.dim(`Current: ${current}`));
  renderer.line(c.dim("Switch with --model <id> or DEVEXPLAIN_MODEL=<id>"));
}

/** devexplain langs */
export async function runLangs(ctx: RunContext): Promise<void> {
  const { renderer } = ctx;
  const { c } = renderer;

  renderer.line();
  renderer.line(c.bold("Supported languages:"));
  for (const lang of SUPPORTED_LANGS) {
    const marker = lang === ctx.config.language ? c.green(" (current)") : "";
    renderer.line(`  ${languageFlag(lang)} ${c.cyan(lang)}  ${LANGUAGE_NAMES[lang]}${marker}`);
  }
  renderer.line();
  renderer.line(c.dim("Use --lang <code> on any command, or set DEVEXPLAIN_LANG"));
}

/** devexplain version */
export async function runVersion(ctx: RunContext): Promise<void> {
  const { renderer } = ctx;

  renderer.line(`devexplain version ${renderer.c.bold(packageVersion())}`);
  renderer.line(`Node.js: ${process.versions.node}`);

  const backend = await backendName(ctx);
  if (backend) {
    renderer.printSuccess(`AI Backend: ${backend}`);
  } else {
    renderer.printWarning("AI Backend: Not configured");
    renderer.printInfo("Run: devexplain check");
  }
  renderer.line(`Model: ${ctx.backends.currentModel}`);
}
