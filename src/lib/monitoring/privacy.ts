// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: member emails and other PII are never attached unless consented.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven; read on every call so tests can toggle it.
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.ROLLBAR_ALLOW_PII === "1";
}
