import { existsSync, renameSync } from "node:fs";
import { expandHome } from "../utils/paths.js";

export interface ShadowOptions {
	path: string;
	backupSuffix: string;
	overwriteBackup?: boolean;
}

export interface ShadowPaths {
	configPath: string;
	backupPath: string;
}

export interface ShadowHandle extends ShadowPaths {
	readonly restored: boolean;
	restore(): void;
}

export type RestoreStatus = "restored" | "nothing-to-restore";

export function resolveShadowPaths(options: ShadowOptions): ShadowPaths {
	const configPath = expandHome(options.path);
	return { configPath, backupPath: `${configPath}${options.backupSuffix}` };
}

/**
 * Moves the config file to its backup path so the tool falls back to its
 * own defaults. The returned handle moves it back.
 */
export function shadowConfig(options: ShadowOptions): ShadowHandle {
	const { configPath, backupPath } = resolveShadowPaths(options);

	if (!existsSync(configPath)) {
		throw new Error(`Config file not found: ${configPath}`);
	}

	if (existsSync(backupPath) && !options.overwriteBackup) {
		throw new Error(
			`Backup already exists: ${backupPath}. Run 'xcross restore' to move it back, or pass --force to overwrite it`,
		);
	}

	renameSync(configPath, backupPath);

	let restored = false;

	return {
		configPath,
		backupPath,
		get restored() {
			return restored;
		},
		restore() {
			if (restored) return;
			renameSync(backupPath, configPath);
			restored = true;
		},
	};
}

/**
 * Puts back a backup left behind by an interrupted or failed run.
 * When both files exist the backup only wins with `force`.
 */
export function restoreStranded(options: ShadowOptions & { force?: boolean }): RestoreStatus {
	const { configPath, backupPath } = resolveShadowPaths(options);

	if (!existsSync(backupPath)) {
		return "nothing-to-restore";
	}

	if (existsSync(configPath) && !options.force) {
		throw new Error(
			`Both ${configPath} and ${backupPath} exist. Pass --force to replace the config with the backup`,
		);
	}

	renameSync(backupPath, configPath);
	return "restored";
}
