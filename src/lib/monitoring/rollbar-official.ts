// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test no-op, PII filtering,
// and structured error reporting.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

/** The subset of the Rollbar API the bridge logs through. */
export interface MonitoringInstance {
	critical: (...args: Rollbar.LogArgument[]) => void;
	error: (...args: Rollbar.LogArgument[]) => void;
	warning: (...args: Rollbar.LogArgument[]) => void;
	info: (...args: Rollbar.LogArgument[]) => void;
	debug: (...args: Rollbar.LogArgument[]) => void;
	wait: (cb: () => void) => void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST / VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isDevelopment = process.env.NODE_ENV === "development";
const isEnabled =
	(process.env.ROLLBAR_ENABLED === "1" || process.env.ROLLBAR_ENABLED === "true") &&
	Boolean(process.env.ROLLBAR_SERVER_TOKEN);

const baseConfig = {
	captureUncaught: !isDevelopment,
	captureUnhandledRejections: !isDevelopment,
	environment: process.env.NODE_ENV || "development",
	enabled: isEnabled,
	// Without a token Rollbar still echoes to the console, which is the local log.
	verbose: !isEnabled,
};

const noop = () => {};

// In test mode, export a no-op instance to avoid network calls.
export const serverInstance: MonitoringInstance = isTestMode
	? {
			critical: noop,
			error: noop,
			warning: noop,
			info: noop,
			debug: noop,
			wait: (cb: () => void) => cb(),
		}
	: new Rollbar({
			accessToken: process.env.ROLLBAR_SERVER_TOKEN || "disabled",
			...baseConfig,
			payload: {
				server: { root: process.cwd() },
			},
			// PII filtering: always scrub secrets; scrub member identifiers when consent is not granted
			scrubFields: [
				"password",
				"passphrase",
				"privateKey",
				"secret",
				"token",
				"authorization",
				...(isTelemetryConsentGranted()
					? []
					: ["email", "userEmail", "first_name", "last_name", "name", "person"]),
			],
		});

// ── Severity & Error Context ──────────────────────────────────────────────

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	requestId?: string;
	route?: string;
	method?: string;
	additionalData?: Record<string, unknown>;
}

export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	const rollbarContext: Record<string, unknown> = {
		request: {
			id: context?.requestId,
			url: context?.route,
			method: context?.method,
		},
		custom: {
			timestamp: new Date().toISOString(),
			...context?.additionalData,
		},
	};

	switch (severity) {
		case ErrorSeverity.CRITICAL:
			serverInstance.critical(error, rollbarContext);
			break;
		case ErrorSeverity.WARNING:
			serverInstance.warning(error, rollbarContext);
			break;
		case ErrorSeverity.INFO:
			serverInstance.info(error, rollbarContext);
			break;
		default:
			serverInstance.error(error, rollbarContext);
	}
}

// ── Flush helper ──────────────────────────────────────────────────────────

export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		serverInstance.wait(() => resolve());
	});
}
