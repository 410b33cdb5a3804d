/**
 * @sway-paths/core — project root and source file discovery
 */

// Types
export type { DirCheck, DiscoveryConfig, Result, WalkEntry } from "./types";

// Schemas
export { DiscoveryConfigSchema } from "./schemas";

// Constants
export {
  CONFIG_FILE_NAME,
  ENV_EXTENSION,
  ENV_MANIFEST,
  MANIFEST_FILE_NAME,
  SWAY_EXTENSION,
} from "./constants";

// Config
export { defaultDiscoveryConfig, parseDiscoveryConfig } from "./config";

// Source files
export { getFilesWithExtension, getSwayFiles, hasExtension, isSwayFile } from "./files";

// Prefixes
export { Prefixes, iterPrefixes } from "./prefixes";

// Manifest directories
export {
  findNestedDirWithFile,
  findNestedManifestDir,
  findParentDirWithFile,
  findParentDirWithFileAndCheck,
  findParentManifestDir,
  findParentManifestDirWithCheck,
} from "./manifest-dir";

// Walking
export { walkTree } from "./walk";
