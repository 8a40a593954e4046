import type { BuildProfile } from "../config/schema.js";

export interface Recipe {
	name: string;
	description: string;
	profile: BuildProfile;
	takesTarget: boolean;
}

export interface BuildInvocation {
	profile: BuildProfile;
	target?: string;
}

export const RECIPES: readonly Recipe[] = [
	{
		name: "cross",
		description: "Build with the default profile",
		profile: "dev",
		takesTarget: false,
	},
	{
		name: "cross-release",
		description: "Build with the release profile",
		profile: "release",
		takesTarget: false,
	},
	{
		name: "cross-target",
		description: "Build for a target with the default profile",
		profile: "dev",
		takesTarget: true,
	},
	{
		name: "cross-release-target",
		description: "Build for a target with the release profile",
		profile: "release",
		takesTarget: true,
	},
];

export function listRecipes(): readonly Recipe[] {
	return RECIPES;
}

export function getRecipe(name: string): Recipe {
	const recipe = RECIPES.find((r) => r.name === name);
	if (!recipe) {
		throw new Error(
			`Unknown recipe: ${name}. Available recipes: ${RECIPES.map((r) => r.name).join(", ")}`,
		);
	}
	return recipe;
}

/**
 * Turns a recipe and its optional target into the invocation handed to the tool.
 * The target is kept exactly as given; the tool decides whether it is valid.
 */
export function resolveInvocation(recipe: Recipe, target?: string): BuildInvocation {
	if (recipe.takesTarget) {
		if (target === undefined || target === "") {
			throw new Error(`Recipe '${recipe.name}' requires a target`);
		}
		return { profile: recipe.profile, target };
	}

	if (target !== undefined) {
		throw new Error(`Recipe '${recipe.name}' does not take a target`);
	}
	return { profile: recipe.profile };
}
