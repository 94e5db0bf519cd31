// ---------------------------------------------------------------------------
// State Store
// One JSON document: identity cache, group memberships, event mappings,
// webhook ledger. Load once, mutate in memory, save full snapshots.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { serverInstance } from "@/lib/monitoring/rollbar-official";
import type { z } from "zod";
import {
	EventSectionSchema,
	GroupMembershipSectionSchema,
	IdentitySectionSchema,
	StateDocumentSectionsSchema,
	WebhookSectionSchema,
} from "./schemas";
import type { EventMapping, StateStats, WebhookLedgerEntry } from "./types";

export const MAX_WEBHOOK_RECORDS = 1000;

export interface StateStoreOptions {
	filePath: string;
	/** Webhook ledger cap (default: 1000) */
	maxWebhookRecords?: number;
	now?: () => number;
}

/**
 * Durable key-value cache backing idempotent re-runs.
 *
 * Single writer per process; there is no file locking. Concurrent runs in
 * separate processes are last-save-wins.
 */
export class StateStore {
	readonly filePath: string;
	private readonly maxWebhookRecords: number;
	private readonly now: () => number;

	private identities = new Map<string, string>();
	private groupMemberships = new Map<string, string[]>();
	private events = new Map<string, EventMapping>();
	private webhooks = new Map<string, WebhookLedgerEntry>();
	private loaded = false;

	constructor(options: StateStoreOptions) {
		this.filePath = options.filePath;
		this.maxWebhookRecords = options.maxWebhookRecords ?? MAX_WEBHOOK_RECORDS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Read the document from disk. Only the first call reads; later calls are
	 * no-ops. A missing or corrupt file (or section) falls back to empty.
	 */
	async load(): Promise<void> {
		if (this.loaded) return;
		this.loaded = true;

		let content: string;
		try {
			content = await fs.readFile(this.filePath, "utf-8");
		} catch (err) {
			if (!isNotFound(err)) {
				serverInstance.warning("State file unreadable, starting empty", {
					filePath: this.filePath,
					error: err instanceof Error ? err.message : String(err),
				});
			}
			return;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch {
			serverInstance.warning("State file is not valid JSON, starting empty", {
				filePath: this.filePath,
			});
			return;
		}

		const sections = StateDocumentSectionsSchema.safeParse(raw);
		if (!sections.success) {
			serverInstance.warning("State file has an unexpected shape, starting empty", {
				filePath: this.filePath,
			});
			return;
		}

		const doc = sections.data;
		this.identities = this.readSection("identities", doc.identities, IdentitySectionSchema);
		this.groupMemberships = this.readSection(
			"groupMemberships",
			doc.groupMemberships,
			GroupMembershipSectionSchema,
		);
		this.events = this.readSection("events", doc.events, EventSectionSchema);
		this.webhooks = this.readSection("webhooks", doc.webhooks, WebhookSectionSchema);
	}

	// ── Identity cache ──────────────────────────────────────────────────────

	getIdentity(email: string): string | undefined {
		return this.identities.get(email);
	}

	setIdentity(email: string, identity: string): void {
		this.identities.set(email, identity);
	}

	listIdentities(): ReadonlyMap<string, string> {
		return this.identities;
	}

	// ── Group memberships ───────────────────────────────────────────────────

	getGroupMemberships(email: string): readonly string[] {
		return this.groupMemberships.get(email) ?? [];
	}

	setGroupMemberships(email: string, spaceIds: readonly string[]): void {
		this.groupMemberships.set(email, [...spaceIds]);
	}

	// ── Event mappings ──────────────────────────────────────────────────────

	getEventMapping(sourceEventId: string): EventMapping | undefined {
		return this.events.get(sourceEventId);
	}

	setEventMapping(sourceEventId: string, mapping: EventMapping): void {
		this.events.set(sourceEventId, { ...mapping });
	}

	removeEventMapping(sourceEventId: string): void {
		this.events.delete(sourceEventId);
	}

	/** Snapshot of every mapping; safe to iterate while removing entries. */
	listEventMappings(): Array<[string, EventMapping]> {
		return Array.from(this.events.entries());
	}

	// ── Webhook ledger ──────────────────────────────────────────────────────

	hasWebhook(webhookId: string): boolean {
		return this.webhooks.has(webhookId);
	}

	/**
	 * Record a processed notification. When the ledger exceeds its cap the
	 * entry with the oldest `processedAt` is evicted (earliest recorded on ties).
	 */
	recordWebhook(webhookId: string, sourceTimestamp?: number): void {
		const processedAt = this.now();
		// Re-recording moves the id to the end of insertion order
		this.webhooks.delete(webhookId);
		this.webhooks.set(webhookId, {
			processedAt,
			sourceTimestamp: sourceTimestamp ?? processedAt,
		});

		while (this.webhooks.size > this.maxWebhookRecords) {
			let oldestId: string | null = null;
			let oldestAt = Number.POSITIVE_INFINITY;
			for (const [id, entry] of this.webhooks) {
				if (entry.processedAt < oldestAt) {
					oldestId = id;
					oldestAt = entry.processedAt;
				}
			}
			if (oldestId === null) break;
			this.webhooks.delete(oldestId);
		}
	}

	// ── Persistence ─────────────────────────────────────────────────────────

	getStats(): StateStats {
		return {
			membersCount: this.identities.size,
			memberSpacesCount: this.groupMemberships.size,
			eventsCount: this.events.size,
			webhooksCount: this.webhooks.size,
		};
	}

	/**
	 * Write the full snapshot atomically (tmp + rename).
	 * Resolves `false` on failure; callers decide whether to continue.
	 */
	async save(): Promise<boolean> {
		const document = {
			identities: Object.fromEntries(this.identities),
			groupMemberships: Object.fromEntries(this.groupMemberships),
			events: Object.fromEntries(this.events),
			webhooks: Object.fromEntries(this.webhooks),
		};

		try {
			await fs.mkdir(path.dirname(this.filePath), { recursive: true });
			const tmpPath = `${this.filePath}.tmp`;
			await fs.writeFile(tmpPath, JSON.stringify(document, null, 2), "utf-8");
			await fs.rename(tmpPath, this.filePath);
			return true;
		} catch (err) {
			serverInstance.error("State save failed", {
				filePath: this.filePath,
				error: err instanceof Error ? err.message : String(err),
			});
			return false;
		}
	}

	private readSection<T>(
		name: string,
		value: unknown,
		schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>,
	): Map<string, T> {
		if (value === undefined) return new Map();

		const result = schema.safeParse(value);
		if (!result.success) {
			serverInstance.warning("State section invalid, starting it empty", {
				filePath: this.filePath,
				section: name,
			});
			return new Map();
		}
		return new Map(Object.entries(result.data));
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}
