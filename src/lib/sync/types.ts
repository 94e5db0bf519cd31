// ---------------------------------------------------------------------------
// Sync Engine: Types
// Normalized members, persisted mappings, collaborator ports, run reports
// ---------------------------------------------------------------------------

import type { LocationType } from "../config";

// ── Members ───────────────────────────────────────────────────────────────

export type MemberKind = "individual" | "corporate_admin" | "corporate_contact";

interface MemberBase {
	/** Trimmed, lowercased; unique key within a run */
	email: string;
	displayName: string;
	/** Lowercased membership type title, or "unmapped" */
	planSlug: string;
}

export interface IndividualMember extends MemberBase {
	memberKind: "individual";
}

export interface CorporateMember extends MemberBase {
	memberKind: "corporate_admin" | "corporate_contact";
	corporateName: string;
}

/** Uniform member shape produced from either directory record type. Transient. */
export type Member = IndividualMember | CorporateMember;

/** Normalized email → ids of the spaces the member currently belongs to. */
export type SpaceMembershipIndex = ReadonlyMap<string, ReadonlySet<string>>;

// ── Persisted state ───────────────────────────────────────────────────────

/** Identity marker for a member invited in this or an earlier run. */
export const PENDING_IDENTITY = "pending";
/** Identity marker for a member found in the space index but never resolved to an id. */
export const KNOWN_IDENTITY = "known";

export interface EventMapping {
	targetEventId: string;
	targetSlug: string;
	/** Epoch ms of the last successful create/update */
	lastSyncTimestamp: number;
	/** Fingerprint of the source content last written to the target */
	contentChecksum: string;
}

export interface WebhookLedgerEntry {
	/** Epoch ms when the notification was accepted */
	processedAt: number;
	/** Epoch ms supplied by the sender, or processedAt when absent */
	sourceTimestamp: number;
}

export interface StateStats {
	membersCount: number;
	memberSpacesCount: number;
	eventsCount: number;
	webhooksCount: number;
}

// ── Collaborator ports ────────────────────────────────────────────────────

/** Read side of the membership directory. Records are validated by the consumer. */
export interface SourceDirectory {
	listAllIndividualMembers(): Promise<unknown[]>;
	listAllCorporateMemberships(): Promise<unknown[]>;
	listEvents(publishedOnly: boolean, futureOnly: boolean): Promise<unknown[]>;
}

export interface TargetSpace {
	id: string;
	name: string;
}

export interface TargetMember {
	id: string | null;
	email: string | null;
}

export interface TargetMemberPage {
	records: TargetMember[];
	hasMore: boolean;
}

export interface MemberInvite {
	email: string;
	name: string;
	spaceIds: string[];
	tags: string[];
}

export interface CreatedTargetEvent {
	id: string;
	slug: string | null;
}

/** Event body as the community platform accepts it. */
export interface TargetEventPayload {
	name: string;
	slug: string;
	body: string;
	starts_at: string | null;
	ends_at: string | null;
	location: string;
	location_type: LocationType;
	host: string;
	rsvp_disabled: boolean;
	send_email_confirmation: boolean;
	send_email_reminder: boolean;
	user_id: string;
	space_id: string;
	cover_image_url?: string;
	timezone?: string;
	venue_name?: string;
	venue_address?: string;
	venue_city?: string;
	venue_country?: string;
	venue_latitude?: number;
	venue_longitude?: number;
}

/** Write and read side of the community platform. */
export interface TargetRegistry {
	listGroups(): Promise<TargetSpace[]>;
	listGroupMembers(spaceId: string, page: number): Promise<TargetMemberPage>;
	addMemberToGroup(email: string, spaceId: string): Promise<void>;
	removeMemberFromGroup(email: string, spaceId: string): Promise<void>;
	inviteMember(invite: MemberInvite): Promise<void>;
	listAllMembers(): Promise<TargetMember[]>;
	createEvent(payload: TargetEventPayload, spaceId: string): Promise<CreatedTargetEvent>;
	updateEvent(eventId: string, payload: TargetEventPayload): Promise<void>;
	deleteEvent(eventId: string, spaceId: string): Promise<void>;
	resolveOwnerIdentity(): Promise<string>;
}

// ── Reports ───────────────────────────────────────────────────────────────

export type OperationResult = "dry_run" | "success" | "error";

/**
 * `converged`: every operation succeeded (or, for dry runs, was planned);
 * `partial`: the run finished with errors; `aborted`: stopped before
 * processing any item.
 */
export type RunStatus = "running" | "converged" | "partial" | "aborted";

export interface InviteDetail {
	action: "invite_member";
	email: string;
	displayName: string;
	planSlug: string;
	memberKind: MemberKind;
	corporateName?: string;
	spaces: string[];
	result: OperationResult;
	error?: string;
}

export interface SpaceChangeDetail {
	action: "add_to_space" | "remove_from_space";
	email: string;
	spaceId: string;
	result: OperationResult;
	error?: string;
}

export type MemberSyncDetail = InviteDetail | SpaceChangeDetail;

export interface EventSyncDetail {
	action: "create_event" | "update_event" | "delete_event";
	sourceEventId: string;
	targetEventId?: string;
	title?: string;
	slug?: string;
	startsAt?: string | null;
	location?: string;
	locationType?: LocationType;
	result: OperationResult;
	error?: string;
}

interface RunReportBase {
	jobId: string;
	startTime: string;
	endTime: string | null;
	dryRun: boolean;
	status: RunStatus;
	abortReason?: string;
	skipped: number;
	errors: number;
}

export interface MemberSyncReport extends RunReportBase {
	invited: number;
	spaceAdds: number;
	spaceRemoves: number;
	duplicatesSkipped: number;
	cacheHits: number;
	cacheMisses: number;
	memberKinds: Record<MemberKind, number>;
	/** Spaces whose member list could not be read; their memberships were treated as empty */
	unreachableSpaces: string[];
	details: MemberSyncDetail[];
}

export interface EventSyncReport extends RunReportBase {
	created: number;
	updated: number;
	deleted: number;
	details: EventSyncDetail[];
}

export interface CacheValidationIssue {
	issue: "missing_in_target" | "missing_in_cache";
	email: string;
	cachedId?: string;
	targetId?: string | null;
}

export interface CacheValidationReport {
	valid: number;
	missingInTarget: number;
	missingInCache: number;
	repaired: number;
	saved: boolean;
	details: CacheValidationIssue[];
}
