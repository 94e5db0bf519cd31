// ---------------------------------------------------------------------------
// Unit Tests: Run Guard
// ---------------------------------------------------------------------------

import { RunGuard } from "@/lib/sync/run-guard";
import { describe, expect, it } from "vitest";
import { deferred } from "../support/fakes";

describe("RunGuard", () => {
	it("runs the function and returns its result", async () => {
		const guard = new RunGuard();

		await expect(guard.tryRun("members", async () => 7)).resolves.toEqual({ started: true, result: 7 });
		expect(guard.isRunning).toBe(false);
	});

	it("starts the function in the same tick the run is claimed", async () => {
		const guard = new RunGuard();
		const calls: string[] = [];

		const run = guard.tryRun("members", async () => {
			calls.push("members");
		});
		const rejected = guard.tryRun("events", async () => {
			calls.push("events");
		});

		expect(calls).toEqual(["members"]);
		await expect(rejected).resolves.toEqual({
			started: false,
			activeRun: { kind: "members", startedAt: expect.any(String) },
		});
		await run;
		expect(guard.isRunning).toBe(false);
	});

	it("rejects a second run while the first is in progress", async () => {
		const guard = new RunGuard();
		const gate = deferred();

		const first = guard.tryRun("members", () => gate.promise);
		const second = await guard.tryRun("events", async () => "never");

		expect(second.started).toBe(false);
		if (!second.started) {
			expect(second.activeRun.kind).toBe("members");
		}
		expect(guard.activeRun?.kind).toBe("members");

		gate.resolve();
		await expect(first).resolves.toEqual({ started: true, result: undefined });
		expect(guard.activeRun).toBeNull();
	});

	it("releases the lock when the run throws", async () => {
		const guard = new RunGuard();

		await expect(
			guard.tryRun("cache_validation", async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		await expect(guard.tryRun("members", async () => "again")).resolves.toEqual({
			started: true,
			result: "again",
		});
	});
});
