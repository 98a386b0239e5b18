import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".media-renamer";
const CONFIG_FILENAME = "config.json";

function resolveHomeDir(env: NodeJS.ProcessEnv, homedir: () => string): string {
  const override = env.MEDIA_RENAMER_HOME?.trim();
  return path.resolve(override || homedir());
}

/**
 * Expand a leading `~` and resolve to an absolute path.
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~") {
    return resolveHomeDir(env, homedir);
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.join(resolveHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/**
 * State directory holding the config file.
 * Can be overridden via MEDIA_RENAMER_STATE_DIR.
 * Default: ~/.media-renamer
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.MEDIA_RENAMER_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Config file path.
 * Precedence: MEDIA_RENAMER_CONFIG_PATH, then `<state dir>/config.json`.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.MEDIA_RENAMER_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}
