import os from "node:os";
import path from "node:path";

/**
 * Resolve the per-user locations devexplain reads and writes.
 * Settings live under the config directory, the history log under the cache directory.
 */
export class AppPaths {
  constructor(
    private readonly configDir: string,
    private readonly cacheDir: string,
  ) {}

  /** Honour DEVEXPLAIN_CONFIG_DIR / DEVEXPLAIN_CACHE_DIR, else the XDG-style defaults. */
  static fromEnv(env: NodeJS.ProcessEnv, home: string = os.homedir()): AppPaths {
    return new AppPaths(
      path.resolve(env.DEVEXPLAIN_CONFIG_DIR || path.join(home, ".config", "devexplain")),
      path.resolve(env.DEVEXPLAIN_CACHE_DIR || path.join(home, ".cache", "devexplain")),
    );
  }

  get configRoot(): string {
    return this.configDir;
  }

  get cacheRoot(): string {
    return this.cacheDir;
  }

  get configFile(): string {
    return path.join(this.configDir, "config.json");
  }

  get historyFile(): string {
    return path.join(this.cacheDir, "history.json");
  }
}
