import { createSuccessResponse } from "@/lib/utils/api-response";
import { Hono } from "hono";
import type { AppDependencies, AppEnv } from "../context";

export function healthRoutes(deps: AppDependencies) {
	const routes = new Hono<AppEnv>();

	routes.get("/health", (c) =>
		createSuccessResponse({ ok: true, activeRun: deps.runGuard.activeRun }, c.get("requestId")),
	);

	return routes;
}
