// ---------------------------------------------------------------------------
// Webhook Deduplicator
// Ledger-backed guard so a redelivered notification does not trigger a run
// ---------------------------------------------------------------------------

import { computeContentHash } from "./checksum";
import { WebhookNotificationSchema } from "./schemas";
import type { StateStore } from "./state-store";

export interface ResolvedWebhook {
	webhookId: string;
	/** Sender-supplied timestamp, when the payload carries one */
	sourceTimestamp?: number;
	/** True when the id was derived from the payload content */
	derived: boolean;
}

/**
 * Identify a notification: a delivery id header, then `id`, `webhookId` or
 * `eventId` in the body, otherwise a content hash of the whole payload.
 */
export function resolveWebhookId(payload: unknown, deliveryId?: string | null): ResolvedWebhook {
	const parsed = WebhookNotificationSchema.safeParse(payload);
	const notification = parsed.success ? parsed.data : undefined;
	const sourceTimestamp = notification?.timestamp;

	const explicitId =
		deliveryId?.trim() || notification?.id || notification?.webhookId || notification?.eventId;
	if (explicitId) {
		return { webhookId: explicitId, sourceTimestamp, derived: false };
	}

	return { webhookId: `sha256:${computeContentHash(payload ?? null)}`, sourceTimestamp, derived: true };
}

export class WebhookDeduplicator {
	constructor(private readonly store: StateStore) {}

	seen(webhookId: string): boolean {
		return this.store.hasWebhook(webhookId);
	}

	/** Record the id and persist the ledger. Resolves `false` when the save failed. */
	async markSeen(webhookId: string, sourceTimestamp?: number): Promise<boolean> {
		this.store.recordWebhook(webhookId, sourceTimestamp);
		return this.store.save();
	}
}
