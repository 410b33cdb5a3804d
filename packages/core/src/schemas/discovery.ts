/**
 * Zod schema for the discovery configuration.
 * The DiscoveryConfig type is derived via z.infer<>.
 */

import { z } from "zod";
import { MANIFEST_FILE_NAME, SWAY_EXTENSION } from "../constants";

export const DiscoveryConfigSchema = z.object({
  /** Source file extension, compared case-sensitively (e.g., "sw") */
  extension: z
    .string()
    .min(1, "extension must not be empty")
    .refine((value) => !value.startsWith("."), "extension must not start with a dot")
    .refine((value) => !/[\\/]/.test(value), "extension must not contain a path separator")
    .default(SWAY_EXTENSION),
  /** Manifest filename marking a project root (e.g., "Forc.toml") */
  manifestFileName: z
    .string()
    .min(1, "manifestFileName must not be empty")
    .refine((value) => !/[\\/]/.test(value), "manifestFileName must be a bare filename")
    .default(MANIFEST_FILE_NAME),
});
