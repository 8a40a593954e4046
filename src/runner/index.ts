export { runRecipe, type RecipeResult, type RunOptions } from "./runner.js";
export { describePlan } from "./plan.js";
export { exitCodeFor } from "./exit.js";
export { trapSignals, type SignalTarget, type SignalTrap } from "./signals.js";
