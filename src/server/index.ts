// ---------------------------------------------------------------------------
// Server entry point
// Validates configuration, loads the state file, serves the trigger surface
// ---------------------------------------------------------------------------

import { createCircleClient } from "@/lib/circle/factory";
import { loadConfig, loadMappingConfig } from "@/lib/config";
import { createGlueUpClient } from "@/lib/glueup/factory";
import { flushRollbar, serverInstance } from "@/lib/monitoring/rollbar-official";
import { RunGuard } from "@/lib/sync/run-guard";
import { StateStore } from "@/lib/sync/state-store";
import { WebhookDeduplicator } from "@/lib/sync/webhook-dedup";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { registerProcessHandlers } from "./process-handlers";

async function main(): Promise<void> {
	registerProcessHandlers();

	const config = loadConfig();
	const mapping = await loadMappingConfig(config.MAPPING_CONFIG_PATH);

	const store = new StateStore({ filePath: config.STATE_FILE_PATH });
	await store.load();

	const app = createApp({
		source: createGlueUpClient(config),
		target: createCircleClient(config),
		store,
		mapping,
		runGuard: new RunGuard(),
		webhooks: new WebhookDeduplicator(store),
		webhookSecret: config.WEBHOOK_SECRET,
	});

	const server = serve({ fetch: app.fetch, port: config.SERVER_PORT }, (info) => {
		serverInstance.info(`Bridge listening on port ${info.port}`, { stats: store.getStats() });
	});

	const shutdown = (signal: string) => {
		serverInstance.info(`Received ${signal}, shutting down`);
		server.close(() => {
			flushRollbar()
				.then(() => process.exit(0))
				.catch(() => process.exit(1));
		});
	};
	process.on("SIGTERM", () => shutdown("SIGTERM"));
	process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
	serverInstance.critical("Bridge failed to start", {
		error: err instanceof Error ? err.message : String(err),
	});
	console.error(err);
	process.exitCode = 1;
});
