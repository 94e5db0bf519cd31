// ---------------------------------------------------------------------------
// Sync Engine: Zod Validation Schemas
// Persisted state document and trigger-surface request bodies
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Persisted state (one JSON document, four sections) ---

export const EventMappingSchema = z.object({
	targetEventId: z.string().min(1),
	targetSlug: z.string(),
	lastSyncTimestamp: z.number(),
	contentChecksum: z.string().min(1),
});

export const WebhookLedgerEntrySchema = z.object({
	processedAt: z.number(),
	sourceTimestamp: z.number(),
});

export const IdentitySectionSchema = z.record(z.string(), z.string());
export const GroupMembershipSectionSchema = z.record(z.string(), z.array(z.string()));
export const EventSectionSchema = z.record(z.string(), EventMappingSchema);
export const WebhookSectionSchema = z.record(z.string(), WebhookLedgerEntrySchema);

/** Sections are validated independently so one damaged section does not discard the others. */
export const StateDocumentSectionsSchema = z.object({
	identities: z.unknown(),
	groupMemberships: z.unknown(),
	events: z.unknown(),
	webhooks: z.unknown(),
});

// --- Trigger surface request bodies ---

export const MemberSyncRequestSchema = z.object({
	dry_run: z.boolean().default(true),
});

export const EventSyncRequestSchema = z.object({
	dry_run: z.boolean().default(true),
	owner_id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
});

export const CacheValidationRequestSchema = z.object({
	repair: z.boolean().default(false),
});

/**
 * Inbound change notification. Every field is optional: providers differ in
 * how they name the delivery id, and the payload is otherwise opaque.
 */
export const WebhookNotificationSchema = z
	.object({
		id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
		webhookId: z.union([z.string().min(1), z.number()]).transform(String).optional(),
		eventId: z.union([z.string().min(1), z.number()]).transform(String).optional(),
		timestamp: z.number().optional(),
	})
	.passthrough();

export type MemberSyncRequest = z.infer<typeof MemberSyncRequestSchema>;
export type EventSyncRequest = z.infer<typeof EventSyncRequestSchema>;
export type WebhookNotification = z.infer<typeof WebhookNotificationSchema>;
