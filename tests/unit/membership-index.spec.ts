// ---------------------------------------------------------------------------
// Unit Tests: Membership Index Builder
// ---------------------------------------------------------------------------

import { buildMembershipIndex } from "@/lib/sync/membership-index";
import type { TargetMemberPage } from "@/lib/sync/types";
import { describe, expect, it, vi } from "vitest";
import { FakeTargetRegistry } from "../support/fakes";

describe("buildMembershipIndex", () => {
	it("paginates every space and normalizes emails", async () => {
		const target = new FakeTargetRegistry();
		target.pageSize = 2;
		target.spaceMembers.set("g1", [" A@X.com ", "b@x.com", "c@x.com"]);
		target.spaceMembers.set("g2", ["a@x.com"]);

		const { index, failedSpaces } = await buildMembershipIndex(
			target,
			[
				{ id: "g1", name: "One" },
				{ id: "g2", name: "Two" },
			],
			"job-1",
		);

		expect(failedSpaces).toEqual([]);
		expect([...(index.get("a@x.com") ?? [])]).toEqual(["g1", "g2"]);
		expect([...(index.get("c@x.com") ?? [])]).toEqual(["g1"]);
		expect(index.size).toBe(3);
	});

	it("skips records without an email", async () => {
		const target = {
			listGroupMembers: vi.fn(
				async (): Promise<TargetMemberPage> => ({
					records: [
						{ id: "1", email: null },
						{ id: "2", email: "   " },
						{ id: "3", email: "d@x.com" },
					],
					hasMore: false,
				}),
			),
		};

		const { index } = await buildMembershipIndex(target, [{ id: "g1", name: "" }], "job-1");
		expect([...index.keys()]).toEqual(["d@x.com"]);
	});

	it("leaves out a space that fails part-way and reports it", async () => {
		const target = {
			listGroupMembers: vi.fn(async (spaceId: string, page: number): Promise<TargetMemberPage> => {
				if (spaceId === "broken" && page === 2) throw new Error("timeout");
				return { records: [{ id: null, email: `${spaceId}-p${page}@x.com` }], hasMore: page < 2 };
			}),
		};

		const { index, failedSpaces } = await buildMembershipIndex(
			target,
			[
				{ id: "broken", name: "" },
				{ id: "ok", name: "" },
			],
			"job-1",
		);

		expect(failedSpaces).toEqual(["broken"]);
		expect(index.has("broken-p1@x.com")).toBe(false);
		expect([...index.keys()]).toEqual(["ok-p1@x.com", "ok-p2@x.com"]);
	});
});
