// ---------------------------------------------------------------------------
// Trigger surface: Hono application
// Request ids, request logging, JSON envelopes, error mapping
// ---------------------------------------------------------------------------

import { ConfigurationError } from "@/lib/config";
import { GlueUpAuthError } from "@/lib/glueup/auth";
import { ApiError, ApiResponseShapeError } from "@/lib/http/client";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import { createApiLogger } from "@/lib/utils/api-logger";
import { ErrorCodes, createErrorResponse } from "@/lib/utils/api-response";
import { createRequestContextFromRequest } from "@/lib/utils/request-id";
import { Hono } from "hono";
import type { AppDependencies, AppEnv } from "./context";
import { cacheRoutes } from "./routes/cache";
import { healthRoutes } from "./routes/health";
import { spacesRoutes } from "./routes/spaces";
import { syncRoutes } from "./routes/sync";
import { webhookRoutes } from "./routes/webhooks";

function isUpstreamError(err: Error): boolean {
	return (
		err instanceof ApiError || err instanceof ApiResponseShapeError || err instanceof GlueUpAuthError
	);
}

export function createApp(deps: AppDependencies) {
	const app = new Hono<AppEnv>();

	app.use("*", async (c, next) => {
		const context = createRequestContextFromRequest(c.req.raw);
		const logger = createApiLogger(context);
		c.set("requestId", context.id);
		c.set("logger", logger);
		await next();
		logger.trackRequestCompletion(c.res.status);
	});

	app.route("/", healthRoutes(deps));
	app.route("/", spacesRoutes(deps));
	app.route("/", syncRoutes(deps));
	app.route("/", cacheRoutes(deps));
	app.route("/", webhookRoutes(deps));

	app.notFound((c) =>
		createErrorResponse(
			`No route for ${c.req.method} ${c.req.path}`,
			ErrorCodes.INVALID_INPUT,
			c.get("requestId"),
			404,
		),
	);

	app.onError((err, c) => {
		const requestId = c.get("requestId");
		const context = { requestId, route: c.req.path, method: c.req.method };

		if (err instanceof ConfigurationError) {
			reportError(err, context, ErrorSeverity.CRITICAL);
			return createErrorResponse(err.message, ErrorCodes.CONFIGURATION_ERROR, requestId, 500);
		}
		if (isUpstreamError(err)) {
			reportError(err, context, ErrorSeverity.ERROR);
			return createErrorResponse(err.message, ErrorCodes.EXTERNAL_SERVICE_ERROR, requestId, 502);
		}

		reportError(err, context, ErrorSeverity.ERROR);
		return createErrorResponse("Internal server error", ErrorCodes.INTERNAL_ERROR, requestId, 500);
	});

	return app;
}

export type App = ReturnType<typeof createApp>;
