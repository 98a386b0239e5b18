import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import fs from "node:fs";
import os from "node:os";
import type { SchemeToken } from "../rename/types.js";
import { formatErrorMessage } from "../rename/errors.js";
import { DEFAULT_SUBSTITUTION_CHAR, validateSubstitutionChar } from "../rename/sanitize.js";
import { DEFAULT_SCHEME, parseSchemePattern } from "../rename/scheme.js";
import { resolveConfigPath } from "./paths.js";

export const RenamerConfigSchema = Type.Object(
  {
    scheme: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Default naming scheme, e.g. 'Vacation_{date_time}'",
      }),
    ),
    substitution_char: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Character that replaces characters not allowed in file names",
      }),
    ),
  },
  { additionalProperties: false },
);

export type RenamerConfig = Static<typeof RenamerConfigSchema>;

export type ResolvedRenamerConfig = {
  scheme: SchemeToken[];
  subChar: string;
};

export function resolveRenamerConfig(config: RenamerConfig): ResolvedRenamerConfig {
  return {
    scheme: config.scheme ? parseSchemePattern(config.scheme) : [...DEFAULT_SCHEME],
    subChar: config.substitution_char ?? DEFAULT_SUBSTITUTION_CHAR,
  };
}

/**
 * Validate parsed JSON against the config schema. Returns error messages (empty = valid).
 * `substitution_char` is checked with the same rule `Renamer.subChar` enforces.
 */
export function validateRenamerConfig(value: unknown): string[] {
  const errors = [...Value.Errors(RenamerConfigSchema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  if (typeof value === "object" && value !== null && "substitution_char" in value) {
    const subChar = value.substitution_char;
    const problem = typeof subChar === "string" ? validateSubstitutionChar(subChar) : null;
    if (problem) {
      errors.push(`/substitution_char: ${problem}`);
    }
  }
  return errors;
}

export type ConfigIO = {
  configPath: string;
  /** Missing file means an empty config. Throws on unreadable or invalid files. */
  loadConfig(): RenamerConfig;
};

export function createConfigIO(
  opts: {
    env?: NodeJS.ProcessEnv;
    homedir?: () => string;
    configPath?: string;
  } = {},
): ConfigIO {
  const env = opts.env ?? process.env;
  const homedir = opts.homedir ?? os.homedir;
  const configPath = opts.configPath ?? resolveConfigPath(env, homedir);

  return {
    configPath,
    loadConfig() {
      if (!fs.existsSync(configPath)) {
        return {};
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      } catch (err) {
        throw new Error(`Failed to read config at ${configPath}: ${formatErrorMessage(err)}`, {
          cause: err,
        });
      }
      const errors = validateRenamerConfig(parsed);
      if (errors.length > 0 || !Value.Check(RenamerConfigSchema, parsed)) {
        throw new Error(`Invalid config at ${configPath}: ${errors.join("; ")}`);
      }
      return parsed;
    },
  };
}
