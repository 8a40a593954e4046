import { describe, expect, it } from "vitest";
import { getRecipe, listRecipes, resolveInvocation } from "./definitions.js";

describe("recipes", () => {
	it("defines the four cross recipes", () => {
		expect(listRecipes().map((r) => [r.name, r.profile, r.takesTarget])).toEqual([
			["cross", "dev", false],
			["cross-release", "release", false],
			["cross-target", "dev", true],
			["cross-release-target", "release", true],
		]);
	});

	it("looks recipes up by name", () => {
		expect(getRecipe("cross-release").profile).toBe("release");
	});

	it("rejects unknown recipe names", () => {
		expect(() => getRecipe("cross-debug")).toThrow(
			"Unknown recipe: cross-debug. Available recipes: cross, cross-release, cross-target, cross-release-target",
		);
	});
});

describe("resolveInvocation", () => {
	it("keeps the target exactly as given", () => {
		const target = " aarch64-unknown-linux-gnu;$(echo) ";

		expect(resolveInvocation(getRecipe("cross-release-target"), target)).toEqual({
			profile: "release",
			target,
		});
	});

	it("leaves the target out for plain recipes", () => {
		expect(resolveInvocation(getRecipe("cross"))).toEqual({ profile: "dev" });
	});

	it("requires a target for target recipes", () => {
		expect(() => resolveInvocation(getRecipe("cross-target"))).toThrow(
			"Recipe 'cross-target' requires a target",
		);
		expect(() => resolveInvocation(getRecipe("cross-target"), "")).toThrow(
			"Recipe 'cross-target' requires a target",
		);
	});

	it("refuses a target for plain recipes", () => {
		expect(() => resolveInvocation(getRecipe("cross-release"), "x86_64-pc-windows-gnu")).toThrow(
			"Recipe 'cross-release' does not take a target",
		);
	});
});
