// ---------------------------------------------------------------------------
// Member Sync Orchestration
// Index once → normalize → per member: resolve identity, invite or reconcile
// ---------------------------------------------------------------------------

import type { MappingConfig } from "@/lib/config";
import {
	logSyncCritical,
	logSyncDebug,
	logSyncError,
	logSyncInfo,
	logSyncWarning,
} from "@/lib/monitoring/sync-logger";
import { v4 as uuidv4 } from "uuid";
import { buildMembershipIndex } from "./membership-index";
import { normalizeEmail, normalizeMembers } from "./member-normalizer";
import { decideSpaces, type ReconcileResult, reconcileSpaces } from "./member-reconciler";
import type { StateStore } from "./state-store";
import {
	type CacheValidationReport,
	KNOWN_IDENTITY,
	type Member,
	type MemberSyncReport,
	PENDING_IDENTITY,
	type SourceDirectory,
	type TargetRegistry,
	type TargetSpace,
} from "./types";

export interface MemberSyncDependencies {
	source: SourceDirectory;
	target: TargetRegistry;
	store: StateStore;
	mapping: MappingConfig;
}

export interface MemberSyncOptions {
	dryRun: boolean;
	jobId?: string;
}

function createReport(jobId: string, dryRun: boolean): MemberSyncReport {
	return {
		jobId,
		startTime: new Date().toISOString(),
		endTime: null,
		dryRun,
		status: "running",
		invited: 0,
		spaceAdds: 0,
		spaceRemoves: 0,
		skipped: 0,
		errors: 0,
		duplicatesSkipped: 0,
		cacheHits: 0,
		cacheMisses: 0,
		memberKinds: { individual: 0, corporate_admin: 0, corporate_contact: 0 },
		unreachableSpaces: [],
		details: [],
	};
}

function abort(report: MemberSyncReport, reason: string): MemberSyncReport {
	report.status = "aborted";
	report.abortReason = reason;
	report.errors++;
	report.endTime = new Date().toISOString();
	logSyncCritical(report.jobId, `Member sync aborted: ${reason}`);
	return report;
}

function applyReconcile(report: MemberSyncReport, result: ReconcileResult): void {
	report.spaceAdds += result.adds;
	report.spaceRemoves += result.removes;
	report.errors += result.errors;
	report.details.push(...result.details);
}

/**
 * Converge community space memberships toward the directory.
 *
 * The membership index is captured once and stays frozen for the run.
 * In dry-run mode nothing is written to the target and the store is not
 * saved; cache repairs stay in memory.
 */
export async function syncMembers(
	deps: MemberSyncDependencies,
	options: MemberSyncOptions,
): Promise<MemberSyncReport> {
	const { source, target, store, mapping } = deps;
	const { dryRun } = options;
	const report = createReport(options.jobId ?? uuidv4(), dryRun);
	const { jobId } = report;

	await store.load();

	// 1. Snapshot current memberships
	let spaces: TargetSpace[];
	try {
		spaces = await target.listGroups();
	} catch (err) {
		return abort(report, `Failed to list spaces: ${errorMessage(err)}`);
	}
	const { index, failedSpaces } = await buildMembershipIndex(target, spaces, jobId);
	report.unreachableSpaces = failedSpaces;
	logSyncInfo(jobId, "space", "index", "Membership index built", {
		spaces: spaces.length,
		indexedMembers: index.size,
		unreachableSpaces: failedSpaces.length,
	});

	// 2. Fetch and normalize directory members
	let individualRecords: unknown[];
	let corporateRecords: unknown[];
	try {
		individualRecords = await source.listAllIndividualMembers();
		corporateRecords = await source.listAllCorporateMemberships();
	} catch (err) {
		return abort(report, `Failed to fetch directory members: ${errorMessage(err)}`);
	}
	const normalized = normalizeMembers(individualRecords, corporateRecords, jobId);
	report.skipped += normalized.droppedEmpty;
	report.errors += normalized.failed;

	// 3. Invite or reconcile each unique member
	const seenInBatch = new Set<string>();

	for (const member of normalized.members) {
		const { email } = member;
		report.memberKinds[member.memberKind]++;

		if (seenInBatch.has(email)) {
			report.duplicatesSkipped++;
			logSyncDebug(jobId, "member", email, "Duplicate email in batch, skipping");
			continue;
		}
		seenInBatch.add(email);

		const desiredSpaces = decideSpaces(member.planSlug, mapping);
		let identity = store.getIdentity(email);

		if (identity !== undefined) {
			report.cacheHits++;
		} else if (index.has(email)) {
			// Present in the target despite a stale cache
			store.setIdentity(email, KNOWN_IDENTITY);
			identity = KNOWN_IDENTITY;
			report.cacheHits++;
			logSyncInfo(jobId, "member", email, "Found in target but not in cache, repaired as known");
		} else {
			report.cacheMisses++;
		}

		if (identity === undefined) {
			const invited = await inviteMember(deps, report, member, desiredSpaces);
			if (!invited) continue;

			const result = await reconcileSpaces(target, email, desiredSpaces, index, dryRun, jobId);
			applyReconcile(report, result);
			if (!dryRun) store.setGroupMemberships(email, result.resultingSpaces);
			continue;
		}

		const result = await reconcileSpaces(target, email, desiredSpaces, index, dryRun, jobId);
		applyReconcile(report, result);
		if (!dryRun) store.setGroupMemberships(email, result.resultingSpaces);
		if (result.adds === 0 && result.removes === 0 && result.errors === 0) {
			report.skipped++;
		}
	}

	// 4. Persist
	if (!dryRun && !(await store.save())) {
		logSyncError(jobId, "state", store.filePath, "Final state save failed; recent changes may be lost");
	}

	report.status = report.errors === 0 ? "converged" : "partial";
	report.endTime = new Date().toISOString();
	logSyncInfo(jobId, "run", "members", "Member sync complete", {
		dryRun,
		status: report.status,
		invited: report.invited,
		spaceAdds: report.spaceAdds,
		spaceRemoves: report.spaceRemoves,
		skipped: report.skipped,
		errors: report.errors,
		duplicatesSkipped: report.duplicatesSkipped,
		memberKinds: report.memberKinds,
	});
	return report;
}

/**
 * Invite a member the target does not know yet. The target deduplicates
 * invites for existing addresses. On success the member is seeded into the
 * cache as pending and the store is saved immediately.
 */
async function inviteMember(
	deps: MemberSyncDependencies,
	report: MemberSyncReport,
	member: Member,
	spaces: string[],
): Promise<boolean> {
	const { target, store, mapping } = deps;
	const corporate = member.memberKind === "individual" ? {} : { corporateName: member.corporateName };
	const detailBase = {
		action: "invite_member" as const,
		email: member.email,
		displayName: member.displayName,
		planSlug: member.planSlug,
		memberKind: member.memberKind,
		...corporate,
		spaces,
	};

	if (report.dryRun) {
		report.invited++;
		report.details.push({ ...detailBase, result: "dry_run" });
		return true;
	}

	try {
		await target.inviteMember({
			email: member.email,
			name: member.displayName,
			spaceIds: spaces,
			tags: mapping.inviteTags,
		});
	} catch (err) {
		const message = errorMessage(err);
		report.errors++;
		report.details.push({ ...detailBase, result: "error", error: message });
		logSyncError(report.jobId, "member", member.email, `Invite failed: ${message}`);
		return false;
	}

	report.invited++;
	report.details.push({ ...detailBase, result: "success" });
	store.setIdentity(member.email, PENDING_IDENTITY);
	if (!(await store.save())) {
		logSyncWarning(report.jobId, "member", member.email, "State save failed after invite; continuing");
	}
	return true;
}

/**
 * Compare the identity cache with the community's member list.
 * With `repair`, members missing from the cache are seeded with their id
 * and the store is saved.
 */
export async function validateIdentityCache(
	target: Pick<TargetRegistry, "listAllMembers">,
	store: StateStore,
	repair: boolean,
	jobId: string = uuidv4(),
): Promise<CacheValidationReport> {
	await store.load();

	const report: CacheValidationReport = {
		valid: 0,
		missingInTarget: 0,
		missingInCache: 0,
		repaired: 0,
		saved: false,
		details: [],
	};

	const targetMembers = new Map<string, string | null>();
	for (const member of await target.listAllMembers()) {
		const email = normalizeEmail(member.email);
		if (email) targetMembers.set(email, member.id);
	}

	for (const [email, cachedId] of store.listIdentities()) {
		if (targetMembers.has(normalizeEmail(email))) {
			report.valid++;
		} else {
			report.missingInTarget++;
			report.details.push({ issue: "missing_in_target", email, cachedId });
		}
	}

	for (const [email, targetId] of targetMembers) {
		if (store.getIdentity(email) !== undefined) continue;
		report.missingInCache++;
		report.details.push({ issue: "missing_in_cache", email, targetId });
		if (repair) {
			store.setIdentity(email, targetId ?? KNOWN_IDENTITY);
			report.repaired++;
		}
	}

	if (repair && report.repaired > 0) {
		report.saved = await store.save();
		if (!report.saved) {
			logSyncError(jobId, "state", store.filePath, "Failed to save repaired identity cache");
		}
	}

	logSyncInfo(jobId, "cache", "identities", "Identity cache validated", {
		valid: report.valid,
		missingInTarget: report.missingInTarget,
		missingInCache: report.missingInCache,
		repaired: report.repaired,
	});
	return report;
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
