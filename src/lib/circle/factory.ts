// ---------------------------------------------------------------------------
// Circle Client Factory
// ---------------------------------------------------------------------------

import type { AppConfig } from "../config";
import { CircleClient } from "./client";

export function createCircleClient(config: AppConfig): CircleClient {
	return new CircleClient({
		baseUrl: config.CIRCLE_BASE_URL,
		apiToken: config.CIRCLE_API_TOKEN,
		eventOwnerId: config.CIRCLE_EVENT_OWNER_ID,
		eventOwnerEmail: config.CIRCLE_EVENT_OWNER_EMAIL,
		rateLimit: config.API_RATE_LIMIT,
		maxRetries: config.API_MAX_RETRIES,
	});
}
