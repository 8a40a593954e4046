import chalk from "chalk";
import type { Config } from "../config/schema.js";
import { restoreStranded, resolveShadowPaths } from "../shadow/index.js";
import { displayPath } from "../utils/paths.js";

export function runRestore(config: Config, force: boolean): void {
	const { configPath, backupPath } = resolveShadowPaths(config.shadow);
	const status = restoreStranded({ ...config.shadow, force });

	if (status === "nothing-to-restore") {
		console.log(chalk.dim(`No backup at ${displayPath(backupPath)}, nothing to restore`));
		return;
	}

	console.log(chalk.green(`✓ Moved ${displayPath(backupPath)} back to ${displayPath(configPath)}`));
}
