// ---------------------------------------------------------------------------
// POST /webhooks/glueup: inbound change notification
// ---------------------------------------------------------------------------
//
// A notification triggers a full (non-dry) member sync. Deliveries already in
// the ledger are acknowledged without running. The id is recorded only once
// the run has the lock, so a delivery rejected with 409 can be retried.
//

import { syncMembers } from "@/lib/sync/member-sync";
import { resolveWebhookId } from "@/lib/sync/webhook-dedup";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";
import { Hono } from "hono";
import { readJson } from "../body";
import type { AppDependencies, AppEnv } from "../context";
import { syncAlreadyRunning } from "./sync";

export function webhookRoutes(deps: AppDependencies) {
	const routes = new Hono<AppEnv>();

	routes.post("/webhooks/glueup", async (c) => {
		const requestId = c.get("requestId");
		const logger = c.get("logger");

		if (deps.webhookSecret) {
			const authHeader = c.req.header("Authorization");
			if (authHeader !== `Bearer ${deps.webhookSecret}`) {
				logger.warn("Webhook unauthorized - invalid token");
				return createErrorResponse("Unauthorized", ErrorCodes.UNAUTHORIZED, requestId, 401);
			}
		}

		const body = await readJson(c);
		if (!body.ok) return body.response;

		await deps.store.load();
		const { webhookId, sourceTimestamp, derived } = resolveWebhookId(
			body.data,
			c.req.header("X-Webhook-Id"),
		);

		if (deps.webhooks.seen(webhookId)) {
			logger.info("Duplicate webhook skipped", { webhookId });
			return createSuccessResponse(
				{ received: true, skipped: true, reason: "duplicate", webhookId },
				requestId,
			);
		}

		const outcome = await deps.runGuard.tryRun("members", async () => {
			if (!(await deps.webhooks.markSeen(webhookId, sourceTimestamp))) {
				logger.warn("Webhook ledger save failed; a redelivery may run again", { webhookId });
			}
			return syncMembers(deps, { dryRun: false });
		});
		if (!outcome.started) return syncAlreadyRunning(outcome.activeRun, requestId);

		logger.info("Webhook sync finished", {
			webhookId,
			derivedId: derived,
			jobId: outcome.result.jobId,
			status: outcome.result.status,
		});
		return createSuccessResponse(
			{ received: true, skipped: false, webhookId, report: outcome.result },
			requestId,
		);
	});

	return routes;
}
