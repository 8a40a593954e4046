#!/usr/bin/env node

import chalk from "chalk";
import { Command } from "commander";
import { runInit } from "./commands/init.js";
import { runRestore } from "./commands/restore.js";
import { type Config, DEFAULT_CONFIG_FILE, loadConfig } from "./config/index.js";
import { type Recipe, listRecipes, resolveInvocation } from "./recipes/index.js";
import { describePlan, exitCodeFor, runRecipe } from "./runner/index.js";
import { getAdapter } from "./tools/index.js";

type GlobalOptions = {
	config: string;
	tool?: string;
	shadow?: string;
	force?: boolean;
	restoreOnFailure: boolean;
	dryRun?: boolean;
	verbose?: boolean;
};

const program = new Command();

program
	.name("xcross")
	.description("Run cross builds with the user cargo config moved out of the way")
	.version("0.1.0")
	.option("-c, --config <path>", "Config file path", DEFAULT_CONFIG_FILE)
	.option("--tool <command>", "Build tool command")
	.option("--shadow <path>", "Config file to move aside during the build")
	.option("--force", "Overwrite an existing backup")
	.option("--no-restore-on-failure", "Leave the config at its backup path when the build fails")
	.option("--dry-run", "Show what would run without executing")
	.option("-v, --verbose", "Verbose output");

function loadWithOverrides(options: GlobalOptions): Config {
	return loadConfig({
		configPath: options.config,
		cliOverrides: {
			tool: options.tool,
			shadowPath: options.shadow,
			restoreOnFailure: options.restoreOnFailure,
			overwriteBackup: options.force,
		},
	});
}

function fail(error: unknown): never {
	if (error instanceof Error) {
		console.error(chalk.red(`Error: ${error.message}`));
	} else {
		console.error(chalk.red("An unexpected error occurred"));
	}
	process.exit(1);
}

function printConfig(config: Config): void {
	console.log(chalk.bold("\nConfiguration:"));
	console.log(chalk.dim("─".repeat(40)));
	console.log(`  Tool:               ${chalk.cyan(config.tool.command)}`);
	console.log(`  Shadowed file:      ${chalk.cyan(config.shadow.path)}`);
	console.log(`  Backup suffix:      ${chalk.cyan(config.shadow.backupSuffix)}`);
	console.log(`  Restore on failure: ${chalk.cyan(config.shadow.restoreOnFailure)}`);
	console.log(`  Overwrite backup:   ${chalk.cyan(config.shadow.overwriteBackup)}`);
	console.log(chalk.dim("─".repeat(40)));
}

async function dryRun(recipe: Recipe, target: string | undefined, config: Config): Promise<void> {
	const invocation = resolveInvocation(recipe, target);

	console.log(chalk.bold(`\n${recipe.name}:`));
	for (const line of describePlan(invocation, config)) {
		console.log(`  ${chalk.yellow(line)}`);
	}
	console.log(chalk.yellow("\nDry run - no execution"));

	const isAvailable = await getAdapter(config.tool).isAvailable();
	if (isAvailable) {
		console.log(chalk.green(`\n✓ Tool '${config.tool.command}' is available`));
	} else {
		console.log(chalk.red(`\n⚠ Warning: '${config.tool.command}' is not installed or not in PATH`));
	}
}

function registerRecipe(recipe: Recipe): void {
	const command = program.command(recipe.name).description(recipe.description);
	if (recipe.takesTarget) {
		command.argument("<target>", "Target triple, passed to the tool as given");
	}

	command.action(async (...actionArgs: unknown[]) => {
		const target = recipe.takesTarget ? String(actionArgs[0]) : undefined;
		const options = program.opts<GlobalOptions>();

		try {
			const config = loadWithOverrides(options);

			if (options.verbose || options.dryRun) {
				printConfig(config);
			}

			if (options.dryRun) {
				await dryRun(recipe, target, config);
				return;
			}

			const result = await runRecipe({ recipe, target, config });
			process.exitCode = exitCodeFor(result);
		} catch (error) {
			fail(error);
		}
	});
}

for (const recipe of listRecipes()) {
	registerRecipe(recipe);
}

program
	.command("list")
	.description("List the available recipes")
	.action(() => {
		for (const recipe of listRecipes()) {
			const usage = recipe.takesTarget ? `${recipe.name} <target>` : recipe.name;
			console.log(`  ${chalk.cyan(usage.padEnd(30))} ${chalk.dim(recipe.description)}`);
		}
	});

program
	.command("restore")
	.description("Move a backup left by an interrupted build back into place")
	.action(() => {
		const options = program.opts<GlobalOptions>();
		try {
			runRestore(loadWithOverrides(options), options.force === true);
		} catch (error) {
			fail(error);
		}
	});

program
	.command("init")
	.description(`Initialize ${DEFAULT_CONFIG_FILE} for the current project`)
	.action(async () => {
		try {
			await runInit(program.opts<GlobalOptions>().config);
		} catch (error) {
			fail(error);
		}
	});

await program.parseAsync();
