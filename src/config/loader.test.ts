import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./defaults.js";
import { loadConfig, writeConfig } from "./loader.js";

describe("loadConfig", () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "xcross-config-"));
		configPath = join(dir, "xcross.config.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("returns the defaults when the file does not exist", () => {
		expect(loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
	});

	it("merges a partial file over the defaults", () => {
		writeFileSync(configPath, JSON.stringify({ shadow: { backupSuffix: ".bak" } }));

		const config = loadConfig({ configPath });

		expect(config.shadow).toEqual({
			path: "~/.cargo/config.toml",
			backupSuffix: ".bak",
			restoreOnFailure: true,
			overwriteBackup: false,
		});
		expect(config.tool).toEqual(DEFAULT_CONFIG.tool);
	});

	it("applies CLI overrides on top of the file", () => {
		writeFileSync(configPath, JSON.stringify({ tool: { command: "cross-from-file" } }));

		const config = loadConfig({
			configPath,
			cliOverrides: {
				tool: "/opt/bin/cross",
				shadowPath: "/srv/cargo/config.toml",
				restoreOnFailure: false,
				overwriteBackup: true,
			},
		});

		expect(config.tool.command).toBe("/opt/bin/cross");
		expect(config.shadow.path).toBe("/srv/cargo/config.toml");
		expect(config.shadow.restoreOnFailure).toBe(false);
		expect(config.shadow.overwriteBackup).toBe(true);
	});

	it("does not let a default CLI flag undo a file setting", () => {
		writeFileSync(configPath, JSON.stringify({ shadow: { restoreOnFailure: false } }));

		const config = loadConfig({ configPath, cliOverrides: { restoreOnFailure: true } });

		expect(config.shadow.restoreOnFailure).toBe(false);
	});

	it("rejects invalid JSON", () => {
		writeFileSync(configPath, "{ not json");

		expect(() => loadConfig({ configPath })).toThrow(`Invalid JSON in config file: ${configPath}`);
	});

	it("rejects a file that is not an object", () => {
		writeFileSync(configPath, "[]");

		expect(() => loadConfig({ configPath })).toThrow(
			`Config file must contain a JSON object: ${configPath}`,
		);
	});

	it("lists schema errors by path", () => {
		writeFileSync(configPath, JSON.stringify({ shadow: { backupSuffix: "" } }));

		expect(() => loadConfig({ configPath })).toThrow(
			"Invalid configuration:\n  - shadow.backupSuffix: backup suffix must not be empty",
		);
	});

	it("reads back what writeConfig wrote", () => {
		const config = {
			...DEFAULT_CONFIG,
			tool: { ...DEFAULT_CONFIG.tool, extraArgs: ["--locked"] },
		};

		writeConfig(config, configPath);

		expect(loadConfig({ configPath })).toEqual(config);
	});
});
