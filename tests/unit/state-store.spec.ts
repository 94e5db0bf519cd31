// ---------------------------------------------------------------------------
// Unit Tests: State Store
// Load fallbacks, snapshot persistence, webhook ledger cap
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StateStore } from "@/lib/sync/state-store";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempStore, removeTempDir } from "../support/fakes";

describe("StateStore", () => {
	let dir: string;
	let filePath: string;
	let store: StateStore;

	beforeEach(async () => {
		({ store, dir, filePath } = await createTempStore());
	});

	afterEach(async () => {
		await removeTempDir(dir);
	});

	describe("load", () => {
		it("starts empty when the file does not exist", async () => {
			await store.load();
			expect(store.getStats()).toEqual({
				membersCount: 0,
				memberSpacesCount: 0,
				eventsCount: 0,
				webhooksCount: 0,
			});
		});

		it("starts empty when the file is not valid JSON", async () => {
			await fs.mkdir(path.dirname(filePath), { recursive: true });
			await fs.writeFile(filePath, "{ not json", "utf-8");

			await expect(store.load()).resolves.toBeUndefined();
			expect(store.getStats().membersCount).toBe(0);
		});

		it("drops only the section that fails validation", async () => {
			await fs.mkdir(path.dirname(filePath), { recursive: true });
			await fs.writeFile(
				filePath,
				JSON.stringify({
					identities: { "a@x.com": 5 },
					events: {
						"42": {
							targetEventId: "evt-1",
							targetSlug: "launch-42",
							lastSyncTimestamp: 1,
							contentChecksum: "abc",
						},
					},
				}),
				"utf-8",
			);

			await store.load();
			expect(store.getIdentity("a@x.com")).toBeUndefined();
			expect(store.getEventMapping("42")?.targetEventId).toBe("evt-1");
		});

		it("is idempotent: a second load keeps in-memory changes", async () => {
			await store.load();
			store.setIdentity("a@x.com", "pending");
			await store.load();
			expect(store.getIdentity("a@x.com")).toBe("pending");
		});
	});

	describe("save", () => {
		it("writes a snapshot that a new store reads back", async () => {
			await store.load();
			store.setIdentity("a@x.com", "123");
			store.setGroupMemberships("a@x.com", ["g1", "g2"]);
			store.setEventMapping("42", {
				targetEventId: "evt-1",
				targetSlug: "launch-42",
				lastSyncTimestamp: 1700000000000,
				contentChecksum: "abc",
			});
			store.recordWebhook("wh-1", 99);

			await expect(store.save()).resolves.toBe(true);

			const reloaded = new StateStore({ filePath });
			await reloaded.load();
			expect(reloaded.getIdentity("a@x.com")).toBe("123");
			expect(reloaded.getGroupMemberships("a@x.com")).toEqual(["g1", "g2"]);
			expect(reloaded.getEventMapping("42")).toEqual({
				targetEventId: "evt-1",
				targetSlug: "launch-42",
				lastSyncTimestamp: 1700000000000,
				contentChecksum: "abc",
			});
			expect(reloaded.hasWebhook("wh-1")).toBe(true);
		});

		it("uses the four-section document layout and leaves no temp file", async () => {
			await store.load();
			store.setIdentity("a@x.com", "pending");
			await store.save();

			const doc = JSON.parse(await fs.readFile(filePath, "utf-8"));
			expect(Object.keys(doc)).toEqual(["identities", "groupMemberships", "events", "webhooks"]);
			await expect(fs.access(`${filePath}.tmp`)).rejects.toThrow();
		});

		it("resolves false instead of throwing when the write fails", async () => {
			const blocker = path.join(dir, "blocker");
			await fs.writeFile(blocker, "", "utf-8");
			const blocked = new StateStore({ filePath: path.join(blocker, "state.json") });

			await expect(blocked.save()).resolves.toBe(false);
		});
	});

	describe("event mappings", () => {
		it("removes a mapping", async () => {
			store.setEventMapping("42", {
				targetEventId: "evt-1",
				targetSlug: "s",
				lastSyncTimestamp: 1,
				contentChecksum: "c",
			});
			store.removeEventMapping("42");
			expect(store.getEventMapping("42")).toBeUndefined();
			expect(store.listEventMappings()).toEqual([]);
		});
	});

	describe("webhook ledger", () => {
		it("evicts the entry with the oldest processedAt beyond the cap", async () => {
			let clock = 0;
			await removeTempDir(dir);
			({ store, dir, filePath } = await createTempStore({
				maxWebhookRecords: 3,
				now: () => ++clock,
			}));

			store.recordWebhook("w1"); // 1
			store.recordWebhook("w2"); // 2
			store.recordWebhook("w3"); // 3
			store.recordWebhook("w4"); // 4 → w1 evicted
			expect(store.hasWebhook("w1")).toBe(false);

			store.recordWebhook("w2"); // re-recorded at 5
			store.recordWebhook("w5"); // 6 → w3 evicted
			expect(store.hasWebhook("w3")).toBe(false);
			expect(store.hasWebhook("w2")).toBe(true);
			expect(store.hasWebhook("w4")).toBe(true);
			expect(store.hasWebhook("w5")).toBe(true);
			expect(store.getStats().webhooksCount).toBe(3);
		});

		it("defaults the source timestamp to the processing time", async () => {
			await removeTempDir(dir);
			({ store, dir, filePath } = await createTempStore({ now: () => 1234 }));
			store.recordWebhook("wh-1");
			store.recordWebhook("wh-2", 99);
			await store.save();

			const doc = JSON.parse(await fs.readFile(filePath, "utf-8"));
			expect(doc.webhooks).toEqual({
				"wh-1": { processedAt: 1234, sourceTimestamp: 1234 },
				"wh-2": { processedAt: 1234, sourceTimestamp: 99 },
			});
		});
	});
});
