// ---------------------------------------------------------------------------
// Request-scoped logging for the trigger surface, backed by Rollbar
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "../monitoring/privacy";
import { serverInstance } from "../monitoring/rollbar-official";
import type { RequestContext } from "./request-id";

/**
 * Logger bound to one inbound request.
 */
export class ApiLogger {
	private startTime: number = Date.now();

	constructor(private requestContext: RequestContext) {}

	/**
	 * Return a scrubbed copy of the request context.
	 * When PII consent is not granted, `ip` and `userAgent` are stripped.
	 */
	private safeContext(): Omit<RequestContext, "ip" | "userAgent"> & {
		ip?: string;
		userAgent?: string;
	} {
		if (isTelemetryConsentGranted()) return this.requestContext;
		const { ip: _ip, userAgent: _ua, ...safe } = this.requestContext;
		return safe;
	}

	error(message: string, error?: Error, data?: unknown): void {
		serverInstance.error(message, {
			requestId: this.requestContext.id,
			error: error?.message,
			stack: error?.stack,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	warn(message: string, data?: unknown): void {
		serverInstance.warning(message, {
			requestId: this.requestContext.id,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	info(message: string, data?: unknown): void {
		serverInstance.info(message, {
			requestId: this.requestContext.id,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	/**
	 * Track request completion with timing
	 */
	trackRequestCompletion(statusCode: number): void {
		const duration = Date.now() - this.startTime;
		serverInstance.info(
			`Request completed: ${this.requestContext.method} ${this.requestContext.url}`,
			{
				requestId: this.requestContext.id,
				statusCode,
				durationMs: duration,
				context: this.safeContext(),
				timestamp: new Date().toISOString(),
			},
		);
	}
}

export function createApiLogger(requestContext: RequestContext): ApiLogger {
	return new ApiLogger(requestContext);
}
