import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from "./defaults.js";
import { type Config, ConfigSchema } from "./schema.js";

export interface LoadConfigOptions {
	configPath?: string;
	cliOverrides?: Partial<{
		tool: string;
		shadowPath: string;
		restoreOnFailure: boolean;
		overwriteBackup: boolean;
	}>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
	const configPath = options.configPath || DEFAULT_CONFIG_FILE;
	const absolutePath = resolve(process.cwd(), configPath);

	let fileConfig: Record<string, unknown> = {};

	if (existsSync(absolutePath)) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(absolutePath, "utf-8"));
		} catch (error) {
			if (error instanceof SyntaxError) {
				throw new Error(`Invalid JSON in config file: ${absolutePath}`);
			}
			throw error;
		}
		if (!isRecord(parsed)) {
			throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
		}
		fileConfig = parsed;
	}

	const overrides = options.cliOverrides ?? {};
	const toolOverrides: Record<string, unknown> = {};
	const shadowOverrides: Record<string, unknown> = {};
	if (overrides.tool !== undefined) {
		toolOverrides.command = overrides.tool;
	}
	if (overrides.shadowPath !== undefined) {
		shadowOverrides.path = overrides.shadowPath;
	}
	// Flags only ever switch these away from the defaults
	if (overrides.restoreOnFailure === false) {
		shadowOverrides.restoreOnFailure = false;
	}
	if (overrides.overwriteBackup === true) {
		shadowOverrides.overwriteBackup = true;
	}

	// Merge: defaults <- file config <- CLI overrides
	const merged = {
		...fileConfig,
		tool: {
			...DEFAULT_CONFIG.tool,
			...(isRecord(fileConfig.tool) ? fileConfig.tool : {}),
			...toolOverrides,
		},
		shadow: {
			...DEFAULT_CONFIG.shadow,
			...(isRecord(fileConfig.shadow) ? fileConfig.shadow : {}),
			...shadowOverrides,
		},
	};

	const result = ConfigSchema.safeParse(merged);
	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `  - ${e.path.join(".")}: ${e.message}`)
			.join("\n");
		throw new Error(`Invalid configuration:\n${errors}`);
	}

	return result.data;
}

export function writeConfig(config: Config, path: string): void {
	const absolutePath = resolve(process.cwd(), path);
	writeFileSync(absolutePath, `${JSON.stringify(config, null, "\t")}\n`, "utf-8");
}

export function configExists(path = DEFAULT_CONFIG_FILE): boolean {
	return existsSync(resolve(process.cwd(), path));
}
