import { describe, expect, it } from "vitest";
import { ConfigSchema } from "../config/schema.js";
import { describePlan } from "./plan.js";

describe("describePlan", () => {
	it("lists the move, the build and the move back", () => {
		const config = ConfigSchema.parse({ shadow: { path: "/srv/cargo/config.toml" } });

		expect(describePlan({ profile: "release", target: "riscv64gc-unknown-linux-gnu" }, config)).toEqual([
			"mv /srv/cargo/config.toml /srv/cargo/config.toml.old",
			"cross build --release --target riscv64gc-unknown-linux-gnu",
			"mv /srv/cargo/config.toml.old /srv/cargo/config.toml",
		]);
	});

	it("uses the configured tool and suffix", () => {
		const config = ConfigSchema.parse({
			tool: { command: "cargo-zigbuild", subcommand: "zigbuild" },
			shadow: { path: "/srv/cargo/config.toml", backupSuffix: ".bak" },
		});

		expect(describePlan({ profile: "dev" }, config)).toEqual([
			"mv /srv/cargo/config.toml /srv/cargo/config.toml.bak",
			"cargo-zigbuild zigbuild",
			"mv /srv/cargo/config.toml.bak /srv/cargo/config.toml",
		]);
	});
});
