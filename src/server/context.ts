// ---------------------------------------------------------------------------
// Trigger surface: shared dependencies and Hono environment
// ---------------------------------------------------------------------------

import type { MappingConfig } from "@/lib/config";
import type { RunGuard } from "@/lib/sync/run-guard";
import type { StateStore } from "@/lib/sync/state-store";
import type { SourceDirectory, TargetRegistry } from "@/lib/sync/types";
import type { WebhookDeduplicator } from "@/lib/sync/webhook-dedup";
import type { ApiLogger } from "@/lib/utils/api-logger";

export interface AppDependencies {
	source: SourceDirectory;
	target: TargetRegistry;
	store: StateStore;
	mapping: MappingConfig;
	runGuard: RunGuard;
	webhooks: WebhookDeduplicator;
	/** When set, webhook deliveries must carry `Authorization: Bearer <secret>` */
	webhookSecret?: string;
}

export type AppEnv = {
	Variables: {
		requestId: string;
		logger: ApiLogger;
	};
};
