import type { Config } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "./xcross.config.json";

// Mirrors `cross build` with ~/.cargo/config.toml moved to ~/.cargo/config.toml.old
export const DEFAULT_CONFIG: Config = {
	tool: {
		command: "cross",
		subcommand: "build",
		extraArgs: [],
	},
	shadow: {
		path: "~/.cargo/config.toml",
		backupSuffix: ".old",
		restoreOnFailure: true,
		overwriteBackup: false,
	},
};
