import chalk from "chalk";
import ora from "ora";
import type { Config } from "../config/schema.js";
import { type Recipe, resolveInvocation } from "../recipes/definitions.js";
import { type ShadowHandle, shadowConfig } from "../shadow/index.js";
import { type ExecutionResult, type ToolAdapter, getAdapter } from "../tools/index.js";
import { displayPath } from "../utils/paths.js";
import { type SignalTarget, trapSignals } from "./signals.js";

export interface RunOptions {
	recipe: Recipe;
	target?: string;
	config: Config;
	adapter?: ToolAdapter;
	signals?: SignalTarget;
}

export interface RecipeResult {
	recipe: string;
	args: string[];
	exitCode: number;
	signal: NodeJS.Signals | null;
	interrupted: NodeJS.Signals | null;
	duration: number;
	restored: boolean;
	configPath: string;
	backupPath: string;
	success: boolean;
}

function shadowWithSpinner(config: Config): ShadowHandle {
	const spinner = ora(`Moving ${config.shadow.path} aside`).start();
	try {
		const handle = shadowConfig(config.shadow);
		spinner.succeed(
			`Moved ${displayPath(handle.configPath)} to ${displayPath(handle.backupPath)}`,
		);
		return handle;
	} catch (error) {
		spinner.fail(`Could not move ${config.shadow.path} aside`);
		throw error;
	}
}

function restoreWithSpinner(handle: ShadowHandle): void {
	const spinner = ora(`Restoring ${displayPath(handle.configPath)}`).start();
	try {
		handle.restore();
		spinner.succeed(`Restored ${displayPath(handle.configPath)}`);
	} catch (error) {
		spinner.fail(`Could not restore ${displayPath(handle.configPath)}`);
		throw error;
	}
}

function reportStranded(handle: ShadowHandle): void {
	console.log(
		chalk.yellow(
			`\nConfig left at ${displayPath(handle.backupPath)}. Run 'xcross restore' to move it back.`,
		),
	);
}

/**
 * Runs one recipe: shadow the config, invoke the tool once, restore the config.
 * With `restoreOnFailure` off a failed or interrupted build leaves the config
 * at its backup path.
 */
export async function runRecipe(options: RunOptions): Promise<RecipeResult> {
	const { recipe, target, config } = options;

	// Usage errors surface before anything on disk changes
	const invocation = resolveInvocation(recipe, target);
	const adapter = options.adapter ?? getAdapter(config.tool);
	const args = adapter.buildArgs(invocation);

	// Resolved before shadowing: the lookup may start a login shell that reads the config
	const commandPath = await adapter.resolveCommandPath();
	if (commandPath === null) {
		throw new Error(`Tool '${config.tool.command}' is not installed or not in PATH`);
	}

	const handle = shadowWithSpinner(config);
	const trap = trapSignals(options.signals);

	console.log(chalk.cyan(`\n━━━ ${recipe.name}: ${[config.tool.command, ...args].join(" ")} ━━━\n`));

	let result: ExecutionResult;
	try {
		result = await adapter.execute(args, { signal: trap.signal, commandPath });
	} catch (error) {
		trap.dispose();
		if (config.shadow.restoreOnFailure) {
			try {
				restoreWithSpinner(handle);
			} catch (restoreError) {
				const message = restoreError instanceof Error ? restoreError.message : String(restoreError);
				console.log(chalk.red(`\nRestore failed: ${message}`));
				reportStranded(handle);
			}
		} else {
			reportStranded(handle);
		}
		throw error;
	}
	trap.dispose();

	const success = result.exitCode === 0 && trap.interrupted === null;

	if (success || config.shadow.restoreOnFailure) {
		restoreWithSpinner(handle);
	} else {
		reportStranded(handle);
	}

	if (trap.interrupted) {
		console.log(chalk.yellow(`\n${recipe.name} interrupted by ${trap.interrupted}`));
	} else if (result.error) {
		console.log(chalk.red(`\nFailed to start ${config.tool.command}: ${result.error}`));
	} else if (result.exitCode !== 0) {
		console.log(chalk.red(`\n${recipe.name} failed with exit code ${result.exitCode}`));
	} else {
		console.log(
			chalk.green(`\n✓ ${recipe.name} complete (${(result.duration / 1000).toFixed(1)}s)`),
		);
	}

	return {
		recipe: recipe.name,
		args,
		exitCode: result.exitCode,
		signal: result.signal,
		interrupted: trap.interrupted,
		duration: result.duration,
		restored: handle.restored,
		configPath: handle.configPath,
		backupPath: handle.backupPath,
		success,
	};
}
