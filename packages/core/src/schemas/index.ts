export { DiscoveryConfigSchema } from "./discovery";
