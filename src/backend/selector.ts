import { BackendNotAvailableError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { AIBackend } from "./types.js";

const log = createChildLogger("backend");

export type BackendFactory = (model: string) => AIBackend;

export const NO_BACKEND_HELP =
  "No AI backend available. Please either:\n" +
  "  1. Install GitHub CLI and authenticate:\n" +
  "     brew install gh && gh auth login\n" +
  "  2. Set a GH_TOKEN or GITHUB_TOKEN environment variable\n" +
  "The account needs access to GitHub Models.";

/**
 * Hands out the backend for this run.
 * The instance is built lazily for the requested model and reused until the
 * model changes.
 */
export class BackendSelector {
  private requestedModel: string | null = null;
  private instance: AIBackend | null = null;

  constructor(
    private readonly defaultModel: string,
    private readonly factory: BackendFactory,
  ) {}

  /** Model the next backend will be built with */
  get currentModel(): string {
    return this.requestedModel ?? this.defaultModel;
  }

  setModel(model: string): void {
    this.requestedModel = model;
    if (this.instance) {
      log.debug({ model }, "Model changed, dropping cached backend");
      this.instance = null;
    }
  }

  async getBackend(): Promise<AIBackend> {
    if (this.instance) return this.instance;

    const backend = this.factory(this.currentModel);
    if (!(await backend.isAvailable())) {
      throw new BackendNotAvailableError(NO_BACKEND_HELP);
    }

    log.debug({ backend: backend.name }, "Backend selected");
    this.instance = backend;
    return backend;
  }
}
