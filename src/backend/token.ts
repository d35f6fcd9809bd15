import { execFile } from "node:child_process";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("token");

/** Returns a token, or null when the helper is missing or fails. */
export type CredentialHelper = () => Promise<string | null>;

/** Ask the GitHub CLI for the logged-in user's token. */
export function ghAuthToken(timeoutMs: number = 10_000): Promise<string | null> {
  return new Promise<string | null>((resolve) => {
    execFile("gh", ["auth", "token"], { timeout: timeoutMs }, (err, stdout) => {
      if (err) {
        log.debug({ err: err.message }, "gh auth token unavailable");
        resolve(null);
        return;
      }
      const token = stdout.trim();
      resolve(token.length > 0 ? token : null);
    });
  });
}

/**
 * Resolve the bearer token for GitHub Models.
 * GH_TOKEN, then GITHUB_TOKEN, then `gh auth token`. The first hit is kept
 * for the lifetime of the resolver; a miss is retried on the next call.
 */
export class TokenResolver {
  private cached: string | null = null;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly helper: CredentialHelper = () => ghAuthToken(),
  ) {}

  async resolve(): Promise<string | null> {
    if (this.cached !== null) return this.cached;

    const fromEnv = this.env.GH_TOKEN || this.env.GITHUB_TOKEN;
    if (fromEnv) {
      log.debug("Token taken from environment");
      this.cached = fromEnv;
      return fromEnv;
    }

    const fromHelper = await this.helper();
    if (fromHelper) {
      log.debug("Token taken from credential helper");
      this.cached = fromHelper;
    }
    return fromHelper;
  }
}
