// ---------------------------------------------------------------------------
// Unit Tests: Member Reconciler
// decideSpaces ordering, minimal diffs, idempotence, fault isolation
// ---------------------------------------------------------------------------

import { parseMappingConfig } from "@/lib/config";
import { decideSpaces, reconcileSpaces } from "@/lib/sync/member-reconciler";
import { describe, expect, it } from "vitest";
import { FakeTargetRegistry } from "../support/fakes";

function indexOf(entries: Record<string, string[]>): Map<string, Set<string>> {
	return new Map(Object.entries(entries).map(([email, spaces]) => [email, new Set(spaces)]));
}

describe("decideSpaces", () => {
	it("puts defaults first and de-duplicates in first-seen order", () => {
		const mapping = { defaultSpaces: ["A", "B"], plansToSpaces: { gold: ["B", "C"] } };
		expect(decideSpaces("gold", mapping)).toEqual(["A", "B", "C"]);
	});

	it("falls back to the defaults for an unmapped plan", () => {
		const mapping = { defaultSpaces: ["A"], plansToSpaces: { gold: ["C"] } };
		expect(decideSpaces("unmapped", mapping)).toEqual(["A"]);
	});

	it("ignores plan names that match inherited object members", () => {
		const mapping = parseMappingConfig({ defaultSpaces: ["general"] });
		for (const plan of ["constructor", "tostring", "__proto__", "hasownproperty"]) {
			expect(decideSpaces(plan, mapping)).toEqual(["general"]);
		}
	});
});

describe("reconcileSpaces", () => {
	it("adds missing spaces and removes extra ones, leaving shared ones alone", async () => {
		const target = new FakeTargetRegistry();
		const index = indexOf({ "a@x.com": ["g2", "g3"] });

		const result = await reconcileSpaces(target, "a@x.com", ["g1", "g2"], index, false);

		expect(target.writes).toEqual(["add a@x.com g1", "remove a@x.com g3"]);
		expect(result.adds).toBe(1);
		expect(result.removes).toBe(1);
		expect(result.errors).toBe(0);
		expect(result.details).toEqual([
			{ action: "add_to_space", email: "a@x.com", spaceId: "g1", result: "success" },
			{ action: "remove_from_space", email: "a@x.com", spaceId: "g3", result: "success" },
		]);
		expect(result.resultingSpaces).toEqual(["g1", "g2"]);
	});

	it("is idempotent once the index matches the desired set", async () => {
		const target = new FakeTargetRegistry();
		const index = indexOf({ "a@x.com": ["g1", "g2"] });

		const result = await reconcileSpaces(target, "a@x.com", ["g2", "g1"], index, false);

		expect(result.adds).toBe(0);
		expect(result.removes).toBe(0);
		expect(target.writes).toEqual([]);
	});

	it("sorts operations and looks the member up by normalized email", async () => {
		const target = new FakeTargetRegistry();
		const index = indexOf({ "a@x.com": ["z", "m"] });

		await reconcileSpaces(target, " A@X.com", ["c", "b"], index, false);

		expect(target.writes).toEqual([
			"add a@x.com b",
			"add a@x.com c",
			"remove a@x.com m",
			"remove a@x.com z",
		]);
	});

	it("reports intents without calling the target in dry-run mode", async () => {
		const target = new FakeTargetRegistry();
		const index = indexOf({ "a@x.com": ["g2", "g3"] });

		const result = await reconcileSpaces(target, "a@x.com", ["g1", "g2"], index, true);

		expect(target.writes).toEqual([]);
		expect(result.details.map((d) => [d.action, d.spaceId, d.result])).toEqual([
			["add_to_space", "g1", "dry_run"],
			["remove_from_space", "g3", "dry_run"],
		]);
		expect(result.resultingSpaces).toEqual(["g2", "g3"]);
	});

	it("records a failed operation and carries on with the rest", async () => {
		const target = new FakeTargetRegistry();
		target.failingSpaceOps.add("add:a@x.com:g1");

		const result = await reconcileSpaces(target, "a@x.com", ["g1", "g4"], new Map(), false);

		expect(target.writes).toEqual(["add a@x.com g1", "add a@x.com g4"]);
		expect(result.adds).toBe(1);
		expect(result.errors).toBe(1);
		expect(result.details[0]).toEqual({
			action: "add_to_space",
			email: "a@x.com",
			spaceId: "g1",
			result: "error",
			error: "add rejected",
		});
		expect(result.resultingSpaces).toEqual(["g4"]);
	});
});
