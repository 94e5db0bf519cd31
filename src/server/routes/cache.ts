// ---------------------------------------------------------------------------
// State cache inspection
// GET /cache/stats, POST /cache/validate
// ---------------------------------------------------------------------------

import { validateIdentityCache } from "@/lib/sync/member-sync";
import { CacheValidationRequestSchema } from "@/lib/sync/schemas";
import { createSuccessResponse } from "@/lib/utils/api-response";
import { Hono } from "hono";
import { parseBody } from "../body";
import type { AppDependencies, AppEnv } from "../context";
import { syncAlreadyRunning } from "./sync";

export function cacheRoutes(deps: AppDependencies) {
	const routes = new Hono<AppEnv>();

	routes.get("/cache/stats", async (c) => {
		await deps.store.load();
		return createSuccessResponse(deps.store.getStats(), c.get("requestId"));
	});

	routes.post("/cache/validate", async (c) => {
		const requestId = c.get("requestId");
		const body = await parseBody(c, CacheValidationRequestSchema);
		if (!body.ok) return body.response;

		// Repair writes the store, so it must not overlap a sync run
		const outcome = await deps.runGuard.tryRun("cache_validation", () =>
			validateIdentityCache(deps.target, deps.store, body.data.repair),
		);
		if (!outcome.started) return syncAlreadyRunning(outcome.activeRun, requestId);

		return createSuccessResponse(outcome.result, requestId);
	});

	return routes;
}
