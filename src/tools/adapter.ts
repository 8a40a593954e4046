import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import type { ToolConfig } from "../config/schema.js";
import type { BuildInvocation } from "../recipes/definitions.js";

export interface ExecutionResult {
	exitCode: number;
	signal: NodeJS.Signals | null;
	duration: number;
	error?: string;
}

export interface ToolAdapter {
	name: string;
	isAvailable(): Promise<boolean>;
	resolveCommandPath(): Promise<string | null>;
	buildArgs(invocation: BuildInvocation): string[];
	execute(args: string[], options?: ExecuteOptions): Promise<ExecutionResult>;
}

export interface ExecuteOptions {
	// Aborting terminates the child with SIGTERM
	signal?: AbortSignal;
	// Already resolved executable; skips the lookup
	commandPath?: string;
}

// Exit code a shell reports for a command it could not find
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export function buildArgs(invocation: BuildInvocation, config: ToolConfig): string[] {
	const args = [config.subcommand];

	if (invocation.profile === "release") {
		args.push("--release");
	}

	if (invocation.target !== undefined) {
		args.push("--target", invocation.target);
	}

	return [...args, ...config.extraArgs];
}

export abstract class BaseToolAdapter implements ToolAdapter {
	abstract name: string;
	protected config: ToolConfig;

	constructor(config: ToolConfig) {
		this.config = config;
	}

	getCommandName(): string {
		return this.config.command;
	}

	async isAvailable(): Promise<boolean> {
		const resolvedPath = await this.resolveCommandPath();
		return resolvedPath !== null;
	}

	// Resolve the full path to the command executable
	async resolveCommandPath(): Promise<string | null> {
		const commandName = this.getCommandName();

		if (commandName.includes("/")) {
			return existsSync(commandName) ? commandName : null;
		}

		// Try common installation locations first (handles shells without cargo's env sourced)
		for (const path of this.getCommonPaths()) {
			if (existsSync(path)) {
				return path;
			}
		}

		const result = await this.executeRaw("/bin/sh", ["-l", "-c", 'command -v "$0"', commandName]);
		if (result.exitCode === 0 && result.stdout.trim()) {
			return result.stdout.trim();
		}

		return null;
	}

	// Override this in subclasses to provide tool-specific installation paths
	protected getCommonPaths(): string[] {
		return [];
	}

	buildArgs(invocation: BuildInvocation): string[] {
		return buildArgs(invocation, this.config);
	}

	async execute(args: string[], options: ExecuteOptions = {}): Promise<ExecutionResult> {
		const commandPath =
			options.commandPath ?? (await this.resolveCommandPath()) ?? this.getCommandName();
		const startTime = Date.now();

		return new Promise((resolve) => {
			// No shell: the target reaches the tool as a single argv entry
			const child = spawn(commandPath, args, {
				stdio: "inherit",
				cwd: process.cwd(),
				signal: options.signal,
			});

			let settled = false;
			const finish = (result: ExecutionResult) => {
				if (settled) return;
				settled = true;
				resolve(result);
			};

			child.on("error", (error) => {
				// An aborted child still emits close once it has exited
				if (error.name === "AbortError") return;
				finish({
					exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
					signal: null,
					duration: Date.now() - startTime,
					error: error.message,
				});
			});

			child.on("close", (code, signal) => {
				finish({
					exitCode: code ?? 1,
					signal,
					duration: Date.now() - startTime,
				});
			});
		});
	}

	protected executeRaw(
		command: string,
		args: string[],
	): Promise<{ exitCode: number; stdout: string; stderr: string }> {
		return new Promise((resolve) => {
			const child = spawn(command, args, {
				stdio: ["ignore", "pipe", "pipe"],
				env: process.env,
			});

			let stdout = "";
			let stderr = "";

			child.stdout?.on("data", (data: Buffer) => {
				stdout += data.toString();
			});

			child.stderr?.on("data", (data: Buffer) => {
				stderr += data.toString();
			});

			child.on("close", (code) => {
				resolve({ exitCode: code ?? 1, stdout, stderr });
			});

			child.on("error", (error) => {
				resolve({ exitCode: 1, stdout, stderr: stderr + error.message });
			});
		});
	}
}
