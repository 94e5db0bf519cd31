// ---------------------------------------------------------------------------
// Unit Tests: Circle Client
// ---------------------------------------------------------------------------

import { CircleClient, type CircleClientOptions, splitName } from "@/lib/circle/client";
import { ConfigurationError } from "@/lib/config";
import { ApiResponseShapeError } from "@/lib/http/client";
import type { TargetEventPayload } from "@/lib/sync/types";
import { describe, expect, it } from "vitest";
import { type ScriptedReply, jsonResponse, scriptedFetch } from "../support/fetch";

function createClient(replies: ScriptedReply[], owner: Partial<CircleClientOptions> = {}) {
	const { fetchFn, calls } = scriptedFetch(replies);
	const client = new CircleClient({
		baseUrl: "https://circle.test",
		apiToken: "test-token",
		rateLimit: 1000,
		maxRetries: 0,
		fetchFn,
		...owner,
	});
	return { client, calls };
}

const payload: TargetEventPayload = {
	name: "Launch",
	slug: "launch-42",
	body: "",
	starts_at: null,
	ends_at: null,
	location: "",
	location_type: "tbd",
	host: "Glue Up Events",
	rsvp_disabled: false,
	send_email_confirmation: true,
	send_email_reminder: true,
	user_id: "owner-1",
	space_id: "events",
};

describe("splitName", () => {
	it("splits at the first whitespace", () => {
		expect(splitName("Ada Lovelace King")).toEqual({ first_name: "Ada", last_name: "Lovelace King" });
		expect(splitName("  Cher ")).toEqual({ first_name: "Cher", last_name: "" });
	});
});

describe("CircleClient", () => {
	it("collects every page of spaces", async () => {
		const { client, calls } = createClient([
			jsonResponse({ records: [{ id: 1, name: "General" }], has_next_page: true }),
			jsonResponse({ records: [{ id: "s2", name: null }], has_next_page: false }),
		]);

		expect(await client.listGroups()).toEqual([
			{ id: "1", name: "General" },
			{ id: "s2", name: "" },
		]);
		expect(calls.map((c) => c.url)).toEqual([
			"https://circle.test/spaces?page=1&per_page=100",
			"https://circle.test/spaces?page=2&per_page=100",
		]);
		expect(calls[0].headers.get("authorization")).toBe("Bearer test-token");
	});

	it("returns one page of space members", async () => {
		const { client, calls } = createClient([
			jsonResponse({ records: [{ id: 5, email: "a@x.com" }, { email: null }], has_next_page: true }),
		]);

		expect(await client.listGroupMembers("s1", 2)).toEqual({
			records: [
				{ id: "5", email: "a@x.com" },
				{ id: null, email: null },
			],
			hasMore: true,
		});
		expect(calls[0].url).toBe("https://circle.test/space_members?space_id=s1&page=2&per_page=100");
	});

	it("rejects a member page without has_next_page", async () => {
		const { client } = createClient([jsonResponse({ records: [] })]);

		await expect(client.listGroupMembers("s1", 1)).rejects.toBeInstanceOf(ApiResponseShapeError);
	});

	it("adds and removes space members", async () => {
		const { client, calls } = createClient([
			jsonResponse({ message: "ok" }),
			new Response(null, { status: 204 }),
		]);

		await client.addMemberToGroup("a@x.com", "s1");
		await client.removeMemberFromGroup("a@x.com", "s1");

		expect(calls[0].method).toBe("POST");
		expect(calls[0].url).toBe("https://circle.test/space_members");
		expect(calls[0].body).toEqual({ email: "a@x.com", space_id: "s1" });
		expect(calls[1].method).toBe("DELETE");
		expect(calls[1].url).toBe("https://circle.test/space_members?email=a%40x.com&space_id=s1");
	});

	it("invites with split names, spaces and tags", async () => {
		const { client, calls } = createClient([jsonResponse({}), jsonResponse({})]);

		await client.inviteMember({
			email: "ada@x.com",
			name: "Ada Lovelace King",
			spaceIds: ["general"],
			tags: ["synced"],
		});
		await client.inviteMember({ email: "anon@x.com", name: " ", spaceIds: [], tags: [] });

		expect(calls[0].url).toBe("https://circle.test/community_members");
		expect(calls[0].body).toEqual({
			email: "ada@x.com",
			first_name: "Ada",
			last_name: "Lovelace King",
			space_ids: ["general"],
			tags: ["synced"],
		});
		expect(calls[1].body).toEqual({ email: "anon@x.com" });
	});

	it("lists all community members", async () => {
		const { client } = createClient([
			jsonResponse({ records: [{ id: 1, email: "a@x.com", name: "A" }], has_next_page: false }),
		]);

		expect(await client.listAllMembers()).toEqual([{ id: "1", email: "a@x.com" }]);
	});

	it("creates, updates and deletes events", async () => {
		const { client, calls } = createClient([
			jsonResponse({ id: 55, slug: "launch-42" }),
			jsonResponse({}),
			new Response(null, { status: 204 }),
		]);

		expect(await client.createEvent(payload, "events")).toEqual({ id: "55", slug: "launch-42" });
		await client.updateEvent("evt/1", payload);
		await client.deleteEvent("55", "events");

		expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
			"POST https://circle.test/events?space_id=events",
			"PUT https://circle.test/events/evt%2F1?space_id=events",
			"DELETE https://circle.test/events/55?space_id=events",
		]);
		expect(calls[0].body).toEqual({ event: payload });
		expect(calls[1].body).toEqual({ event: payload });
	});

	it("reports a missing slug as null", async () => {
		const { client } = createClient([jsonResponse({ id: "e1" })]);

		expect(await client.createEvent(payload, "events")).toEqual({ id: "e1", slug: null });
	});

	describe("resolveOwnerIdentity", () => {
		it("uses the configured id without a request", async () => {
			const { client, calls } = createClient([], { eventOwnerId: "owner-9" });

			expect(await client.resolveOwnerIdentity()).toBe("owner-9");
			expect(calls).toHaveLength(0);
		});

		it("looks the owner up by email", async () => {
			const { client, calls } = createClient([jsonResponse({ id: 77, email: "owner@example.com" })], {
				eventOwnerEmail: "owner@example.com",
			});

			expect(await client.resolveOwnerIdentity()).toBe("77");
			expect(calls[0].url).toBe("https://circle.test/community_members/search?email=owner%40example.com");
		});

		it("fails when neither is configured", async () => {
			const { client } = createClient([]);

			await expect(client.resolveOwnerIdentity()).rejects.toBeInstanceOf(ConfigurationError);
		});
	});
});
