import os from "node:os";
import path from "node:path";

export const CONFIG_DIR_NAME = ".qr-styler";
export const CONFIG_FILE_NAME = "config.json5";

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function safeHomedir(homedir: () => string): string | undefined {
  try {
    return nonEmpty(homedir());
  } catch {
    return undefined;
  }
}

/**
 * Home directory used for config lookup: `QRSTYLE_HOME` wins, then `HOME`,
 * `USERPROFILE` and finally `os.homedir()`.
 */
export function resolveHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string | undefined {
  const osHome = nonEmpty(env.HOME) ?? nonEmpty(env.USERPROFILE) ?? safeHomedir(homedir);
  const explicit = nonEmpty(env.QRSTYLE_HOME);
  if (explicit) {
    const expanded = explicit.replace(/^~(?=$|[\\/])/, osHome ?? "~");
    return expanded.startsWith("~") ? undefined : path.resolve(expanded);
  }
  return osHome ? path.resolve(osHome) : undefined;
}

export function expandHomePath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  if (!input.startsWith("~")) {
    return input;
  }
  const home = resolveHomeDir(env);
  return home ? input.replace(/^~(?=$|[\\/])/, home) : input;
}

/** `explicit` (from --config) > `QRSTYLE_CONFIG_PATH` > `~/.qr-styler/config.json5`. */
export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const override = nonEmpty(explicit) ?? nonEmpty(env.QRSTYLE_CONFIG_PATH);
  if (override) {
    return path.resolve(expandHomePath(override, env));
  }
  const home = resolveHomeDir(env);
  return home ? path.join(home, CONFIG_DIR_NAME, CONFIG_FILE_NAME) : undefined;
}
