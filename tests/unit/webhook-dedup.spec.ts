// ---------------------------------------------------------------------------
// Unit Tests: Webhook Deduplication
// ---------------------------------------------------------------------------

import { computeContentHash } from "@/lib/sync/checksum";
import { StateStore } from "@/lib/sync/state-store";
import { WebhookDeduplicator, resolveWebhookId } from "@/lib/sync/webhook-dedup";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempStore, removeTempDir } from "../support/fakes";

describe("resolveWebhookId", () => {
	it("prefers the delivery header", () => {
		expect(resolveWebhookId({ id: "body-id" }, " hdr-1 ")).toEqual({
			webhookId: "hdr-1",
			sourceTimestamp: undefined,
			derived: false,
		});
	});

	it("falls back through id, webhookId and eventId", () => {
		expect(resolveWebhookId({ id: 17, webhookId: "w", eventId: "e" }).webhookId).toBe("17");
		expect(resolveWebhookId({ webhookId: "w", eventId: "e" }).webhookId).toBe("w");
		expect(resolveWebhookId({ eventId: "e", timestamp: 1234 })).toEqual({
			webhookId: "e",
			sourceTimestamp: 1234,
			derived: false,
		});
	});

	it("ignores a blank header", () => {
		expect(resolveWebhookId({ id: "body-id" }, "   ").webhookId).toBe("body-id");
	});

	it("derives an order-independent content hash when no id is present", () => {
		const first = resolveWebhookId({ type: "member.updated", data: { a: 1, b: 2 } });
		const second = resolveWebhookId({ data: { b: 2, a: 1 }, type: "member.updated" });

		expect(first.derived).toBe(true);
		expect(first.webhookId).toBe(
			`sha256:${computeContentHash({ type: "member.updated", data: { a: 1, b: 2 } })}`,
		);
		expect(second.webhookId).toBe(first.webhookId);
	});

	it("hashes non-object payloads", () => {
		expect(resolveWebhookId(undefined).webhookId).toBe(`sha256:${computeContentHash(null)}`);
	});
});

describe("WebhookDeduplicator", () => {
	let store: StateStore;
	let dir: string;
	let filePath: string;

	beforeEach(async () => {
		({ store, dir, filePath } = await createTempStore({ now: () => 5_000 }));
		await store.load();
	});

	afterEach(async () => {
		await removeTempDir(dir);
	});

	it("reports an id as seen only after it was marked", async () => {
		const dedup = new WebhookDeduplicator(store);

		expect(dedup.seen("wh-1")).toBe(false);
		expect(await dedup.markSeen("wh-1", 42)).toBe(true);
		expect(dedup.seen("wh-1")).toBe(true);
	});

	it("persists the ledger so a restarted process still rejects the id", async () => {
		await new WebhookDeduplicator(store).markSeen("wh-2");

		const restarted = new StateStore({ filePath });
		await restarted.load();

		expect(new WebhookDeduplicator(restarted).seen("wh-2")).toBe(true);
		expect(restarted.getStats().webhooksCount).toBe(1);
	});
});
