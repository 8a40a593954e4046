export interface SignalTarget {
	on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
	off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalTrap {
	readonly interrupted: NodeJS.Signals | null;
	readonly signal: AbortSignal;
	dispose(): void;
}

export const TRAPPED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Holds off termination signals while the config is shadowed. Installing a
 * listener stops Node from exiting on them, so the restore step still runs.
 * The first signal aborts `signal` so the running child can be stopped.
 */
export function trapSignals(
	target: SignalTarget = process,
	signals: readonly NodeJS.Signals[] = TRAPPED_SIGNALS,
): SignalTrap {
	const controller = new AbortController();
	let interrupted: NodeJS.Signals | null = null;

	const listener = (signal: NodeJS.Signals) => {
		if (interrupted !== null) return;
		interrupted = signal;
		controller.abort();
	};

	for (const signal of signals) {
		target.on(signal, listener);
	}

	return {
		get interrupted() {
			return interrupted;
		},
		signal: controller.signal,
		dispose() {
			for (const signal of signals) {
				target.off(signal, listener);
			}
		},
	};
}
