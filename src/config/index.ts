export {
	ConfigSchema,
	type BuildProfile,
	type Config,
	type ShadowConfig,
	type ToolConfig,
} from "./schema.js";
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from "./defaults.js";
export { loadConfig, writeConfig, configExists, type LoadConfigOptions } from "./loader.js";
