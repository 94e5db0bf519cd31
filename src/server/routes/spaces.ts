// ---------------------------------------------------------------------------
// GET /spaces: community spaces, for writing the mapping file
// ---------------------------------------------------------------------------

import { createSuccessResponse } from "@/lib/utils/api-response";
import { Hono } from "hono";
import type { AppDependencies, AppEnv } from "../context";

export function spacesRoutes(deps: AppDependencies) {
	const routes = new Hono<AppEnv>();

	routes.get("/spaces", async (c) => {
		const spaces = await deps.target.listGroups();
		return createSuccessResponse(
			spaces.map((s) => ({ id: s.id, name: s.name })),
			c.get("requestId"),
		);
	});

	return routes;
}
