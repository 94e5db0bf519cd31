// ---------------------------------------------------------------------------
// Manual sync triggers
// POST /sync/members, POST /sync/events: 409 while another run is active
// ---------------------------------------------------------------------------

import { syncEvents } from "@/lib/sync/event-sync";
import { syncMembers } from "@/lib/sync/member-sync";
import type { ActiveRun } from "@/lib/sync/run-guard";
import { EventSyncRequestSchema, MemberSyncRequestSchema } from "@/lib/sync/schemas";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";
import { Hono } from "hono";
import { parseBody } from "../body";
import type { AppDependencies, AppEnv } from "../context";

export function syncAlreadyRunning(activeRun: ActiveRun, requestId: string): Response {
	return createErrorResponse(
		"A sync operation is already running",
		ErrorCodes.SYNC_ALREADY_RUNNING,
		requestId,
		409,
		{ activeRun: activeRun.kind, startedAt: activeRun.startedAt },
	);
}

export function syncRoutes(deps: AppDependencies) {
	const routes = new Hono<AppEnv>();

	routes.post("/sync/members", async (c) => {
		const requestId = c.get("requestId");
		const body = await parseBody(c, MemberSyncRequestSchema);
		if (!body.ok) return body.response;

		const outcome = await deps.runGuard.tryRun("members", () =>
			syncMembers(deps, { dryRun: body.data.dry_run }),
		);
		if (!outcome.started) return syncAlreadyRunning(outcome.activeRun, requestId);

		c.get("logger").info("Member sync finished", {
			jobId: outcome.result.jobId,
			status: outcome.result.status,
		});
		return createSuccessResponse(outcome.result, requestId);
	});

	routes.post("/sync/events", async (c) => {
		const requestId = c.get("requestId");
		const body = await parseBody(c, EventSyncRequestSchema);
		if (!body.ok) return body.response;

		const outcome = await deps.runGuard.tryRun("events", () =>
			syncEvents(
				{ source: deps.source, target: deps.target, store: deps.store, events: deps.mapping.events },
				{ dryRun: body.data.dry_run, ownerId: body.data.owner_id },
			),
		);
		if (!outcome.started) return syncAlreadyRunning(outcome.activeRun, requestId);

		c.get("logger").info("Event sync finished", {
			jobId: outcome.result.jobId,
			status: outcome.result.status,
		});
		return createSuccessResponse(outcome.result, requestId);
	});

	return routes;
}
