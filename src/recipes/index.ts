export {
	getRecipe,
	listRecipes,
	resolveInvocation,
	type BuildInvocation,
	type Recipe,
} from "./definitions.js";
