import type { Config } from "../config/schema.js";
import type { BuildInvocation } from "../recipes/definitions.js";
import { resolveShadowPaths } from "../shadow/index.js";
import { buildArgs } from "../tools/adapter.js";
import { displayPath } from "../utils/paths.js";

export function describePlan(invocation: BuildInvocation, config: Config): string[] {
	const { configPath, backupPath } = resolveShadowPaths(config.shadow);
	const shadowed = displayPath(configPath);
	const backup = displayPath(backupPath);

	return [
		`mv ${shadowed} ${backup}`,
		[config.tool.command, ...buildArgs(invocation, config.tool)].join(" "),
		`mv ${backup} ${shadowed}`,
	];
}
