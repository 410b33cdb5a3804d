/**
 * Discovery constants
 */

/** Extension (without the leading dot) of a Sway source file */
export const SWAY_EXTENSION = "sw";

/** Reserved filename marking the root directory of a Forc project */
export const MANIFEST_FILE_NAME = "Forc.toml";

/** Optional per-project config file read by the CLI */
export const CONFIG_FILE_NAME = "sway-paths.yaml";

/** Environment variables that override config file values */
export const ENV_EXTENSION = "SWAY_PATHS_EXTENSION";
export const ENV_MANIFEST = "SWAY_PATHS_MANIFEST";
