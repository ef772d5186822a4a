export const DEFAULT_CONFIG_FILE = "turnrelay.config.json";

export function getConfigPath(): string {
  return process.env["TURNRELAY_CONFIG_PATH"] ?? DEFAULT_CONFIG_FILE;
}

/** Resolves a path next to the package root: `../../<relative>` from this file in src/ or dist/. */
export function packagePath(relative: string): URL {
  return new URL(`../../${relative}`, import.meta.url);
}
