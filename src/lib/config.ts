// ---------------------------------------------------------------------------
// Environment & Mapping Configuration Loader
// Validates env vars and the space-mapping file with Zod before any run starts
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 0        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Member emails are personal data; enable only with explicit consent.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { z } from "zod";

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

const optionalString = z
	.string()
	.optional()
	.transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const EnvSchema = z
	.object({
		// Glue Up: source directory
		GLUEUP_BASE_URL: z.string().url(),
		GLUEUP_PUBLIC_KEY: z.string().min(1),
		GLUEUP_PRIVATE_KEY: z.string().min(1),
		GLUEUP_EMAIL: z.string().email(),
		GLUEUP_PASSPHRASE: z.string().min(1),
		GLUEUP_ORGANIZATION_ID: z.string().min(1),
		GLUEUP_API_VERSION: z.string().min(1).default("1.0"),

		// Circle: target community
		CIRCLE_BASE_URL: z.string().url().default("https://app.circle.so/api/admin/v2"),
		CIRCLE_API_TOKEN: z.string().min(1),
		CIRCLE_EVENT_OWNER_ID: optionalString,
		CIRCLE_EVENT_OWNER_EMAIL: z.string().email().optional(),

		// Throughput
		API_RATE_LIMIT: z.coerce.number().int().positive().default(5),
		API_MAX_RETRIES: z.coerce.number().int().nonnegative().default(4),

		// Persistence & mapping
		STATE_FILE_PATH: z.string().min(1).default(".cache/state.json"),
		MAPPING_CONFIG_PATH: z.string().min(1).default("config/mapping.json"),

		// Trigger surface
		SERVER_PORT: z.coerce.number().int().positive().default(8080),
		WEBHOOK_SECRET: optionalString,

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(false),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
		ROLLBAR_ALLOW_PII: envBool(false),
	})
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a ConfigurationError listing every missing or invalid variable.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigurationError(
			`Environment configuration invalid:\n${formatIssues(result.error)}`,
		);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}

// ── Mapping file ──────────────────────────────────────────────────────────

export const LocationTypeSchema = z.enum(["in_person", "virtual", "tbd"]);

export const EventFieldOverridesSchema = z.object({
	locationType: LocationTypeSchema.optional(),
	host: z.string().min(1).default("Glue Up Events"),
	rsvpDisabled: z.boolean().default(false),
	sendEmailConfirmation: z.boolean().default(true),
	sendEmailReminder: z.boolean().default(true),
});

export const EventSyncSettingsSchema = z.object({
	createNew: z.boolean().default(true),
	updateExisting: z.boolean().default(true),
	deleteRemoved: z.boolean().default(false),
	publishedOnly: z.boolean().default(true),
	futureOnly: z.boolean().default(true),
});

export const EventMappingConfigSchema = z.object({
	defaultSpaceId: z.string().min(1).optional(),
	syncSettings: EventSyncSettingsSchema.default({}),
	fieldOverrides: EventFieldOverridesSchema.default({}),
});

export const MappingConfigSchema = z.object({
	defaultSpaces: z.array(z.string().min(1)).min(1, "at least one default space is required"),
	plansToSpaces: z.record(z.string(), z.array(z.string().min(1))).default({}),
	inviteTags: z.array(z.string().min(1)).default([]),
	events: EventMappingConfigSchema.default({}),
});

export type LocationType = z.infer<typeof LocationTypeSchema>;
export type MappingConfig = z.infer<typeof MappingConfigSchema>;
export type EventMappingConfig = z.infer<typeof EventMappingConfigSchema>;
export type EventSyncSettings = z.infer<typeof EventSyncSettingsSchema>;
export type EventFieldOverrides = z.infer<typeof EventFieldOverridesSchema>;

/**
 * Validate an already-parsed mapping document.
 * Plan keys are lowercased so they match normalized plan slugs.
 */
export function parseMappingConfig(raw: unknown): MappingConfig {
	const result = MappingConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(`Mapping configuration invalid:\n${formatIssues(result.error)}`);
	}

	const plansToSpaces: Record<string, string[]> = Object.fromEntries(
		Object.entries(result.data.plansToSpaces).map(([plan, spaces]) => [plan.trim().toLowerCase(), spaces]),
	);
	return { ...result.data, plansToSpaces };
}

/** Read and validate the mapping file. Missing or malformed files are fatal. */
export async function loadMappingConfig(mappingPath: string): Promise<MappingConfig> {
	let content: string;
	try {
		content = await fs.readFile(mappingPath, "utf-8");
	} catch (err) {
		throw new ConfigurationError(
			`Mapping configuration not readable at ${mappingPath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch {
		throw new ConfigurationError(`Mapping configuration at ${mappingPath} is not valid JSON`);
	}

	return parseMappingConfig(raw);
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
}
