// ---------------------------------------------------------------------------
// Sync Logging: Rollbar Integration
// Structured log entries for reconciliation and event-sync runs
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "@/lib/monitoring/privacy";
import { serverInstance } from "@/lib/monitoring/rollbar-official";

/**
 * Build a safe context payload for sync log entries.
 * When PII consent is not granted, `subject` is redacted because it is
 * usually a member email.
 */
function safeSyncContext(
	jobId: string,
	entityType: string,
	subject: string,
	data?: Record<string, unknown>,
): Record<string, unknown> {
	return {
		jobId,
		entityType,
		subject: isTelemetryConsentGranted() ? subject : "[redacted]",
		...data,
		timestamp: new Date().toISOString(),
	};
}

export function logSyncInfo(
	jobId: string,
	entityType: string,
	subject: string,
	message: string,
	data?: Record<string, unknown>,
): void {
	serverInstance.info(`Sync: ${message}`, safeSyncContext(jobId, entityType, subject, data));
}

export function logSyncDebug(
	jobId: string,
	entityType: string,
	subject: string,
	message: string,
): void {
	if (process.env.NODE_ENV === "development") {
		serverInstance.debug(`Sync debug: ${message}`, safeSyncContext(jobId, entityType, subject));
	}
}

export function logSyncWarning(
	jobId: string,
	entityType: string,
	subject: string,
	message: string,
): void {
	serverInstance.warning(`Sync warning: ${message}`, safeSyncContext(jobId, entityType, subject));
}

export function logSyncError(
	jobId: string,
	entityType: string,
	subject: string,
	message: string,
): void {
	serverInstance.error(`Sync error: ${message}`, safeSyncContext(jobId, entityType, subject));
}

export function logSyncCritical(jobId: string, message: string): void {
	serverInstance.critical(`Sync critical: ${message}`, {
		jobId,
		timestamp: new Date().toISOString(),
	});
}
