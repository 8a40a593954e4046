import { z } from "zod";

export const ToolConfigSchema = z.object({
	command: z.string().min(1).default("cross"),
	subcommand: z.string().min(1).default("build"),
	extraArgs: z.array(z.string()).default([]),
});

export const ShadowConfigSchema = z.object({
	path: z.string().min(1).default("~/.cargo/config.toml"),
	backupSuffix: z.string().min(1, "backup suffix must not be empty").default(".old"),
	restoreOnFailure: z.boolean().default(true),
	overwriteBackup: z.boolean().default(false),
});

export const ConfigSchema = z.object({
	tool: ToolConfigSchema.default({}),
	shadow: ShadowConfigSchema.default({}),
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type ShadowConfig = z.infer<typeof ShadowConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export type BuildProfile = "dev" | "release";
