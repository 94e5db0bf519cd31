// ---------------------------------------------------------------------------
// Member Reconciler
// Desired vs. current space membership → minimal add/remove operations
// ---------------------------------------------------------------------------

import type { MappingConfig } from "@/lib/config";
import { logSyncError } from "@/lib/monitoring/sync-logger";
import { normalizeEmail } from "./member-normalizer";
import type { SpaceChangeDetail, SpaceMembershipIndex, TargetRegistry } from "./types";

export interface ReconcileResult {
	adds: number;
	removes: number;
	errors: number;
	details: SpaceChangeDetail[];
	/** Spaces the member holds after the successful operations (sorted) */
	resultingSpaces: string[];
}

/**
 * Desired spaces for a plan: default spaces first, then the plan's spaces,
 * de-duplicated keeping the first occurrence.
 */
export function decideSpaces(
	planSlug: string,
	mapping: Pick<MappingConfig, "defaultSpaces" | "plansToSpaces">,
): string[] {
	const planSpaces = Object.hasOwn(mapping.plansToSpaces, planSlug)
		? mapping.plansToSpaces[planSlug]
		: [];
	return Array.from(new Set([...mapping.defaultSpaces, ...planSpaces]));
}

/**
 * Move one member from their indexed spaces to `desiredSpaces`.
 * Each add/remove is isolated: a failure is recorded and the rest proceed.
 * Re-running with an unchanged index and desired set emits nothing.
 */
export async function reconcileSpaces(
	target: Pick<TargetRegistry, "addMemberToGroup" | "removeMemberFromGroup">,
	email: string,
	desiredSpaces: readonly string[],
	index: SpaceMembershipIndex,
	dryRun: boolean,
	jobId = "reconcile",
): Promise<ReconcileResult> {
	const key = normalizeEmail(email);
	const desired = new Set(desiredSpaces);
	const current = new Set(index.get(key) ?? []);
	const resulting = new Set(current);

	const toAdd = [...desired].filter((id) => !current.has(id)).sort();
	const toRemove = [...current].filter((id) => !desired.has(id)).sort();

	const result: ReconcileResult = { adds: 0, removes: 0, errors: 0, details: [], resultingSpaces: [] };

	for (const spaceId of toAdd) {
		if (dryRun) {
			result.adds++;
			result.details.push({ action: "add_to_space", email: key, spaceId, result: "dry_run" });
			continue;
		}
		try {
			await target.addMemberToGroup(key, spaceId);
			result.adds++;
			resulting.add(spaceId);
			result.details.push({ action: "add_to_space", email: key, spaceId, result: "success" });
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			result.errors++;
			result.details.push({ action: "add_to_space", email: key, spaceId, result: "error", error: message });
			logSyncError(jobId, "member", key, `Failed to add to space ${spaceId}: ${message}`);
		}
	}

	for (const spaceId of toRemove) {
		if (dryRun) {
			result.removes++;
			result.details.push({ action: "remove_from_space", email: key, spaceId, result: "dry_run" });
			continue;
		}
		try {
			await target.removeMemberFromGroup(key, spaceId);
			result.removes++;
			resulting.delete(spaceId);
			result.details.push({ action: "remove_from_space", email: key, spaceId, result: "success" });
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			result.errors++;
			result.details.push({
				action: "remove_from_space",
				email: key,
				spaceId,
				result: "error",
				error: message,
			});
			logSyncError(jobId, "member", key, `Failed to remove from space ${spaceId}: ${message}`);
		}
	}

	result.resultingSpaces = [...resulting].sort();
	return result;
}
