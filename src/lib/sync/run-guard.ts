// ---------------------------------------------------------------------------
// Run Guard
// Process-wide lock: at most one sync run at a time
// ---------------------------------------------------------------------------

export type RunKind = "members" | "events" | "cache_validation";

export interface ActiveRun {
	kind: RunKind;
	startedAt: string;
}

export type GuardedRunResult<T> =
	| { started: true; result: T }
	| { started: false; activeRun: ActiveRun };

/**
 * Rejects instead of queueing: a second trigger while a run is in progress
 * gets `started: false` and can be retried by the caller.
 * Runs in other processes sharing the same state file are not covered.
 */
export class RunGuard {
	private active: ActiveRun | null = null;

	get activeRun(): ActiveRun | null {
		return this.active;
	}

	get isRunning(): boolean {
		return this.active !== null;
	}

	async tryRun<T>(kind: RunKind, fn: () => Promise<T>): Promise<GuardedRunResult<T>> {
		if (this.active) {
			return { started: false, activeRun: this.active };
		}

		// Check and claim happen in one synchronous step
		this.active = { kind, startedAt: new Date().toISOString() };
		try {
			return { started: true, result: await fn() };
		} finally {
			this.active = null;
		}
	}
}
