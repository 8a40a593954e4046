import chalk from "chalk";
import inquirer from "inquirer";
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from "../config/defaults.js";
import { configExists, writeConfig } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { getAdapter } from "../tools/index.js";

interface InitAnswers {
	command: string;
	shadowPath: string;
	backupSuffix: string;
	restoreOnFailure: boolean;
}

export async function runInit(path: string = DEFAULT_CONFIG_FILE): Promise<void> {
	console.log(chalk.bold("\nInitializing xcross configuration\n"));

	if (configExists(path)) {
		const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
			{
				type: "confirm",
				name: "overwrite",
				message: `${path} already exists. Overwrite?`,
				default: false,
			},
		]);

		if (!overwrite) {
			console.log(chalk.yellow("Aborted."));
			return;
		}
	}

	const answers = await inquirer.prompt<InitAnswers>([
		{
			type: "input",
			name: "command",
			message: "Build tool command:",
			default: DEFAULT_CONFIG.tool.command,
			validate: (input: string) => (input.trim() ? true : "Command must not be empty"),
		},
		{
			type: "input",
			name: "shadowPath",
			message: "Config file to move aside during builds:",
			default: DEFAULT_CONFIG.shadow.path,
		},
		{
			type: "input",
			name: "backupSuffix",
			message: "Backup suffix:",
			default: DEFAULT_CONFIG.shadow.backupSuffix,
			validate: (input: string) => (input ? true : "Suffix must not be empty"),
		},
		{
			type: "confirm",
			name: "restoreOnFailure",
			message: "Restore the config file when a build fails?",
			default: true,
		},
	]);

	const config: Config = {
		tool: {
			...DEFAULT_CONFIG.tool,
			command: answers.command.trim(),
		},
		shadow: {
			...DEFAULT_CONFIG.shadow,
			path: answers.shadowPath,
			backupSuffix: answers.backupSuffix,
			restoreOnFailure: answers.restoreOnFailure,
		},
	};

	const isAvailable = await getAdapter(config.tool).isAvailable();
	if (!isAvailable) {
		console.log(chalk.yellow(`\n⚠ '${config.tool.command}' is not installed or not in PATH`));
	}

	writeConfig(config, path);

	console.log(chalk.green(`\n✓ Created ${path}`));
	console.log(chalk.dim("\nRun 'xcross list' to see the available recipes."));
}
