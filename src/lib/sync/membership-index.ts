// ---------------------------------------------------------------------------
// Membership Index Builder
// One pass over every space's member list → email → set of space ids
// ---------------------------------------------------------------------------

import { logSyncWarning } from "@/lib/monitoring/sync-logger";
import { normalizeEmail } from "./member-normalizer";
import type { SpaceMembershipIndex, TargetRegistry, TargetSpace } from "./types";

export interface MembershipIndexResult {
	index: SpaceMembershipIndex;
	/** Spaces whose member list could not be read; they contribute no entries */
	failedSpaces: string[];
}

/**
 * Snapshot current space memberships. A space is committed to the index only
 * once all of its pages were read, so a failure part-way through leaves no
 * partial entries behind.
 */
export async function buildMembershipIndex(
	target: Pick<TargetRegistry, "listGroupMembers">,
	spaces: readonly TargetSpace[],
	jobId: string,
): Promise<MembershipIndexResult> {
	const index = new Map<string, Set<string>>();
	const failedSpaces: string[] = [];

	for (const space of spaces) {
		if (!space.id) continue;

		const emails: string[] = [];
		try {
			let page = 1;
			for (;;) {
				const { records, hasMore } = await target.listGroupMembers(space.id, page);
				for (const record of records) {
					const email = normalizeEmail(record.email);
					if (email) emails.push(email);
				}
				if (!hasMore) break;
				page += 1;
			}
		} catch (err) {
			failedSpaces.push(space.id);
			logSyncWarning(
				jobId,
				"space",
				space.id,
				`Failed to list members: ${err instanceof Error ? err.message : String(err)}`,
			);
			continue;
		}

		for (const email of emails) {
			let spaceIds = index.get(email);
			if (!spaceIds) {
				spaceIds = new Set();
				index.set(email, spaceIds);
			}
			spaceIds.add(space.id);
		}
	}

	return { index, failedSpaces };
}
