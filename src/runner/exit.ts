import type { RecipeResult } from "./runner.js";

// Conventional shell exit statuses for a process ended by a signal
const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
	SIGHUP: 129,
	SIGINT: 130,
	SIGTERM: 143,
};

export function exitCodeFor(result: Pick<RecipeResult, "exitCode" | "interrupted">): number {
	if (result.interrupted) {
		return SIGNAL_EXIT_CODES[result.interrupted] ?? 1;
	}
	return result.exitCode;
}
