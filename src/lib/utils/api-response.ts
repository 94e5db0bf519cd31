// ---------------------------------------------------------------------------
// JSON envelopes for the trigger surface
// { success, data | error, meta } with the request id echoed in a header
// ---------------------------------------------------------------------------

export const ErrorCodes = {
	// Authentication
	UNAUTHORIZED: "UNAUTHORIZED",

	// Validation
	VALIDATION_ERROR: "VALIDATION_ERROR",
	INVALID_INPUT: "INVALID_INPUT",

	// Server
	INTERNAL_ERROR: "INTERNAL_ERROR",
	CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
	EXTERNAL_SERVICE_ERROR: "EXTERNAL_SERVICE_ERROR",

	// Run lock
	SYNC_ALREADY_RUNNING: "SYNC_ALREADY_RUNNING",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ResponseMeta {
	requestId: string;
	timestamp: string;
	version: string;
}

export type ApiEnvelope<T> =
	| { success: true; data: T; meta: ResponseMeta }
	| {
			success: false;
			error: { code: ErrorCode; message: string; details?: Record<string, unknown> };
			meta: ResponseMeta;
	  };

const API_VERSION = "1.0";

function meta(requestId?: string): ResponseMeta {
	return {
		requestId: requestId || "unknown",
		timestamp: new Date().toISOString(),
		version: API_VERSION,
	};
}

function respond<T>(body: ApiEnvelope<T>, status: number, requestId?: string): Response {
	return Response.json(body, {
		status,
		headers: requestId ? { "X-Request-ID": requestId } : {},
	});
}

export function createErrorResponse(
	message: string,
	code: ErrorCode,
	requestId?: string,
	httpStatus = 500,
	details?: Record<string, unknown>,
): Response {
	return respond<never>(
		{ success: false, error: { code, message, details }, meta: meta(requestId) },
		httpStatus,
		requestId,
	);
}

export function createSuccessResponse<T>(data: T, requestId?: string, httpStatus = 200): Response {
	return respond({ success: true, data, meta: meta(requestId) }, httpStatus, requestId);
}
