import type { RenameFileSystem } from "./fs.js";
import type { MetadataLookup, MetadataProvider } from "./metadata/provider.js";
import type { RenamePlan, RenamePlanInput, Scheme, SchemeToken } from "./types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { InvalidArgumentError } from "./errors.js";
import { executeRenames } from "./execute.js";
import { nodeFileSystem } from "./fs.js";
import { createMetadataProvider } from "./metadata/provider.js";
import { planRenames } from "./plan.js";
import { DEFAULT_SUBSTITUTION_CHAR, validateSubstitutionChar } from "./sanitize.js";
import { compileScheme, DEFAULT_SCHEME } from "./scheme.js";

export type RenamerOptions = {
  /** Initial default scheme; compiled like `setNamingScheme` input. */
  scheme?: unknown;
  subChar?: string;
  provider?: MetadataProvider;
  fs?: RenameFileSystem;
  logger?: SubsystemLogger;
};

export type GenerateOptions = {
  /** Scheme for this call only. Ignored unless it is a non-empty array. */
  scheme?: unknown;
};

/**
 * Renames files to a naming scheme built from each file's metadata.
 *
 * ```ts
 * const renamer = new Renamer();
 * renamer.setNamingScheme(["Vacation_", metadataKey("date_time")]);
 * const plan = await renamer.generate(["./photos/IMG_0001.jpg"]);
 * await renamer.overwrite(plan);
 * ```
 */
export class Renamer {
  private scheme: SchemeToken[];
  private substitution: string = DEFAULT_SUBSTITUTION_CHAR;
  private readonly provider: MetadataProvider;
  private readonly fs: RenameFileSystem;
  private readonly logger: SubsystemLogger;

  constructor(options: RenamerOptions = {}) {
    this.scheme =
      options.scheme === undefined ? [...DEFAULT_SCHEME] : compileScheme(options.scheme);
    if (options.subChar !== undefined) {
      this.subChar = options.subChar;
    }
    this.provider = options.provider ?? createMetadataProvider();
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? createSubsystemLogger("renamer");
  }

  get namingScheme(): Scheme {
    return [...this.scheme];
  }

  /**
   * Replace the default scheme. Entries that are neither text nor metadata keys are dropped.
   */
  setNamingScheme(input: unknown = []): Scheme {
    this.scheme = compileScheme(input);
    return this.namingScheme;
  }

  get subChar(): string {
    return this.substitution;
  }

  set subChar(value: string) {
    const error = validateSubstitutionChar(value);
    if (error) {
      throw new InvalidArgumentError(error);
    }
    this.substitution = value;
  }

  /**
   * Map each usable path to its new file name. Throws `InvalidArgumentError` when
   * `paths` is not an array; individual files that fail are left out.
   */
  async generate(paths: unknown, options: GenerateOptions = {}): Promise<RenamePlan> {
    const scheme =
      Array.isArray(options.scheme) && options.scheme.length > 0
        ? compileScheme(options.scheme)
        : this.scheme;
    return planRenames(paths, scheme, {
      provider: this.provider,
      fs: this.fs,
      subChar: this.substitution,
      logger: this.logger,
    });
  }

  /**
   * Rename files on disk per the plan. Changes file names; there is no undo.
   */
  async overwrite(plan: RenamePlanInput): Promise<void> {
    await executeRenames(plan, { fs: this.fs, logger: this.logger });
  }

  /** Metadata for one file, routed by extension. */
  async getMetadata(filePath: string): Promise<MetadataLookup> {
    return this.provider.lookup(this.fs.absolutePath(filePath));
  }
}
