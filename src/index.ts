export { createConfigIO, resolveRenamerConfig, type RenamerConfig } from "./config/io.js";
export { resolveConfigPath, resolveStateDir } from "./config/paths.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/logger.js";
export * from "./rename/errors.js";
export { executeRenames, validateNewFilename } from "./rename/execute.js";
export { nodeFileSystem, type RenameFileSystem } from "./rename/fs.js";
export { applyScheme, resolveFilename, type FilenameResolution } from "./rename/generate.js";
export { formatMetadataValue } from "./rename/metadata/format.js";
export {
  audioCapability,
  createMetadataProvider,
  DEFAULT_CAPABILITIES,
  imageCapability,
  type MetadataCapability,
  type MetadataLookup,
  type MetadataProvider,
} from "./rename/metadata/provider.js";
export { planRenames } from "./rename/plan.js";
export { Renamer, type GenerateOptions, type RenamerOptions } from "./rename/renamer.js";
export { DISALLOWED_CHARACTERS, sanitizeFilename } from "./rename/sanitize.js";
export {
  compileScheme,
  DEFAULT_SCHEME,
  formatScheme,
  literal,
  metadataKey,
  parseSchemePattern,
} from "./rename/scheme.js";
export type * from "./rename/types.js";
