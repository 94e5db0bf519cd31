// ---------------------------------------------------------------------------
// Glue Up Client Factory
// Creates a configured GlueUpClient with its credential provider
// ---------------------------------------------------------------------------

import type { AppConfig } from "../config";
import { GlueUpCredentialProvider } from "./auth";
import { GlueUpClient } from "./client";

/**
 * Create a configured GlueUpClient instance.
 * One credential provider is shared by every request the client makes.
 */
export function createGlueUpClient(config: AppConfig): GlueUpClient {
	const credentials = new GlueUpCredentialProvider({
		baseUrl: config.GLUEUP_BASE_URL,
		publicKey: config.GLUEUP_PUBLIC_KEY,
		privateKey: config.GLUEUP_PRIVATE_KEY,
		email: config.GLUEUP_EMAIL,
		passphrase: config.GLUEUP_PASSPHRASE,
		version: config.GLUEUP_API_VERSION,
	});

	return new GlueUpClient({
		baseUrl: config.GLUEUP_BASE_URL,
		credentials,
		organizationId: config.GLUEUP_ORGANIZATION_ID,
		rateLimit: config.API_RATE_LIMIT,
		maxRetries: config.API_MAX_RETRIES,
	});
}
