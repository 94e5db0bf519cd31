// ---------------------------------------------------------------------------
// Event Sync Engine
// Checksum-gated create / update / delete of community events
// ---------------------------------------------------------------------------

import { ConfigurationError, type EventMappingConfig } from "@/lib/config";
import { type GlueUpEvent, GlueUpEventSchema } from "@/lib/glueup/schemas";
import {
	logSyncCritical,
	logSyncDebug,
	logSyncError,
	logSyncInfo,
	logSyncWarning,
} from "@/lib/monitoring/sync-logger";
import { v4 as uuidv4 } from "uuid";
import { computeEventChecksum, transformEvent } from "./event-transform";
import type { StateStore } from "./state-store";
import type {
	EventMapping,
	EventSyncDetail,
	EventSyncReport,
	SourceDirectory,
	TargetEventPayload,
	TargetRegistry,
} from "./types";

export interface EventSyncDependencies {
	source: SourceDirectory;
	target: TargetRegistry;
	store: StateStore;
	events: EventMappingConfig;
}

export interface EventSyncOptions {
	dryRun: boolean;
	/** Owner of created events; resolved from the target when omitted */
	ownerId?: string;
	jobId?: string;
	now?: () => number;
}

interface RunContext {
	deps: EventSyncDependencies;
	report: EventSyncReport;
	spaceId: string;
	ownerId: string;
	now: () => number;
}

function createReport(jobId: string, dryRun: boolean): EventSyncReport {
	return {
		jobId,
		startTime: new Date().toISOString(),
		endTime: null,
		dryRun,
		status: "running",
		created: 0,
		updated: 0,
		deleted: 0,
		skipped: 0,
		errors: 0,
		details: [],
	};
}

function abort(report: EventSyncReport, reason: string): EventSyncReport {
	report.status = "aborted";
	report.abortReason = reason;
	report.errors++;
	report.endTime = new Date().toISOString();
	logSyncCritical(report.jobId, `Event sync aborted: ${reason}`);
	return report;
}

/**
 * Converge community events toward the directory.
 *
 * - no mapping → create (when enabled) and store the mapping
 * - mapping with the same checksum → skip without transforming
 * - mapping with a changed checksum → update in place, keeping the slug
 * - mapping whose source event is gone → delete (when enabled)
 *
 * Each event is isolated: one failure is counted and the others proceed.
 * The store is saved after every successful write.
 *
 * @throws ConfigurationError when no default event space is configured
 */
export async function syncEvents(
	deps: EventSyncDependencies,
	options: EventSyncOptions,
): Promise<EventSyncReport> {
	const { source, target, store, events } = deps;
	const settings = events.syncSettings;
	const spaceId = events.defaultSpaceId;
	if (!spaceId) {
		throw new ConfigurationError("events.defaultSpaceId is not configured");
	}

	const report = createReport(options.jobId ?? uuidv4(), options.dryRun);
	const { jobId } = report;

	await store.load();

	let rawEvents: unknown[];
	try {
		rawEvents = await source.listEvents(settings.publishedOnly, settings.futureOnly);
	} catch (err) {
		return abort(report, `Failed to fetch directory events: ${errorMessage(err)}`);
	}
	logSyncInfo(jobId, "event", "source", `Fetched ${rawEvents.length} directory events`, {
		publishedOnly: settings.publishedOnly,
		futureOnly: settings.futureOnly,
	});

	let ownerId = options.ownerId;
	if (!ownerId) {
		try {
			ownerId = await target.resolveOwnerIdentity();
		} catch (err) {
			if (err instanceof ConfigurationError) throw err;
			return abort(report, `Failed to resolve event owner: ${errorMessage(err)}`);
		}
	}

	const ctx: RunContext = { deps, report, spaceId, ownerId, now: options.now ?? Date.now };
	const seenSourceIds = new Set<string>();

	for (const [position, raw] of rawEvents.entries()) {
		const parsed = GlueUpEventSchema.safeParse(raw);
		if (!parsed.success) {
			report.errors++;
			logSyncWarning(jobId, "event", `#${position}`, `Malformed event: ${parsed.error.message}`);
			continue;
		}

		const event = parsed.data;
		const sourceId = event.id;
		if (!sourceId) {
			report.skipped++;
			logSyncWarning(jobId, "event", `#${position}`, "Event has no id, skipping");
			continue;
		}
		seenSourceIds.add(sourceId);

		const checksum = computeEventChecksum(event);
		const mapping = store.getEventMapping(sourceId);

		if (!mapping) {
			if (settings.createNew) {
				await createEvent(ctx, sourceId, event, checksum);
			} else {
				report.skipped++;
			}
		} else if (mapping.contentChecksum === checksum) {
			report.skipped++;
			logSyncDebug(jobId, "event", sourceId, "Unchanged, skipping");
		} else if (settings.updateExisting) {
			await updateEvent(ctx, sourceId, event, checksum, mapping);
		} else {
			report.skipped++;
		}
	}

	if (settings.deleteRemoved) {
		for (const [sourceId, mapping] of store.listEventMappings()) {
			if (!seenSourceIds.has(sourceId)) {
				await deleteEvent(ctx, sourceId, mapping);
			}
		}
	}

	report.status = report.errors === 0 ? "converged" : "partial";
	report.endTime = new Date().toISOString();
	logSyncInfo(jobId, "run", "events", "Event sync complete", {
		dryRun: report.dryRun,
		status: report.status,
		created: report.created,
		updated: report.updated,
		deleted: report.deleted,
		skipped: report.skipped,
		errors: report.errors,
	});
	return report;
}

function tryTransform(
	ctx: RunContext,
	sourceId: string,
	event: GlueUpEvent,
): TargetEventPayload | null {
	try {
		return transformEvent(event, ctx.spaceId, ctx.ownerId, ctx.deps.events.fieldOverrides);
	} catch (err) {
		ctx.report.errors++;
		logSyncError(ctx.report.jobId, "event", sourceId, `Transform failed: ${errorMessage(err)}`);
		return null;
	}
}

type PayloadSummary = Pick<EventSyncDetail, "title" | "slug" | "startsAt" | "location" | "locationType">;

function summarize(payload: TargetEventPayload): PayloadSummary {
	return {
		title: payload.name,
		slug: payload.slug,
		startsAt: payload.starts_at,
		location: payload.location,
		locationType: payload.location_type,
	};
}

async function persist(ctx: RunContext, sourceId: string): Promise<void> {
	if (!(await ctx.deps.store.save())) {
		logSyncWarning(ctx.report.jobId, "event", sourceId, "State save failed; continuing");
	}
}

async function createEvent(
	ctx: RunContext,
	sourceId: string,
	event: GlueUpEvent,
	checksum: string,
): Promise<void> {
	const { report } = ctx;
	const payload = tryTransform(ctx, sourceId, event);
	if (!payload) return;

	if (report.dryRun) {
		report.created++;
		report.details.push({
			action: "create_event",
			sourceEventId: sourceId,
			...summarize(payload),
			result: "dry_run",
		});
		return;
	}

	try {
		const created = await ctx.deps.target.createEvent(payload, ctx.spaceId);
		const slug = created.slug ?? payload.slug;
		ctx.deps.store.setEventMapping(sourceId, {
			targetEventId: created.id,
			targetSlug: slug,
			lastSyncTimestamp: ctx.now(),
			contentChecksum: checksum,
		});
		await persist(ctx, sourceId);

		report.created++;
		report.details.push({
			action: "create_event",
			sourceEventId: sourceId,
			targetEventId: created.id,
			...summarize(payload),
			slug,
			result: "success",
		});
		logSyncInfo(report.jobId, "event", sourceId, `Created event ${created.id}`);
	} catch (err) {
		const message = errorMessage(err);
		report.errors++;
		report.details.push({
			action: "create_event",
			sourceEventId: sourceId,
			...summarize(payload),
			result: "error",
			error: message,
		});
		logSyncError(report.jobId, "event", sourceId, `Create failed: ${message}`);
	}
}

async function updateEvent(
	ctx: RunContext,
	sourceId: string,
	event: GlueUpEvent,
	checksum: string,
	mapping: EventMapping,
): Promise<void> {
	const { report } = ctx;
	const transformed = tryTransform(ctx, sourceId, event);
	if (!transformed) return;
	// The slug assigned at creation is kept for the life of the event
	const payload: TargetEventPayload = { ...transformed, slug: mapping.targetSlug };
	const detail = {
		action: "update_event" as const,
		sourceEventId: sourceId,
		targetEventId: mapping.targetEventId,
		...summarize(payload),
	};

	if (report.dryRun) {
		report.updated++;
		report.details.push({ ...detail, result: "dry_run" });
		return;
	}

	try {
		await ctx.deps.target.updateEvent(mapping.targetEventId, payload);
		ctx.deps.store.setEventMapping(sourceId, {
			...mapping,
			lastSyncTimestamp: ctx.now(),
			contentChecksum: checksum,
		});
		await persist(ctx, sourceId);

		report.updated++;
		report.details.push({ ...detail, result: "success" });
		logSyncInfo(report.jobId, "event", sourceId, `Updated event ${mapping.targetEventId}`);
	} catch (err) {
		const message = errorMessage(err);
		report.errors++;
		report.details.push({ ...detail, result: "error", error: message });
		logSyncError(report.jobId, "event", sourceId, `Update failed: ${message}`);
	}
}

async function deleteEvent(ctx: RunContext, sourceId: string, mapping: EventMapping): Promise<void> {
	const { report } = ctx;
	const detail = {
		action: "delete_event" as const,
		sourceEventId: sourceId,
		targetEventId: mapping.targetEventId,
		slug: mapping.targetSlug,
	};

	if (report.dryRun) {
		report.deleted++;
		report.details.push({ ...detail, result: "dry_run" });
		return;
	}

	try {
		await ctx.deps.target.deleteEvent(mapping.targetEventId, ctx.spaceId);
		ctx.deps.store.removeEventMapping(sourceId);
		await persist(ctx, sourceId);

		report.deleted++;
		report.details.push({ ...detail, result: "success" });
		logSyncInfo(report.jobId, "event", sourceId, `Deleted event ${mapping.targetEventId}`);
	} catch (err) {
		const message = errorMessage(err);
		report.errors++;
		report.details.push({ ...detail, result: "error", error: message });
		logSyncError(report.jobId, "event", sourceId, `Delete failed: ${message}`);
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
