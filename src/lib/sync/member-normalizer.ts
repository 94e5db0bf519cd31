// ---------------------------------------------------------------------------
// Member Normalizer
// Flattens individual and corporate directory records into uniform members
// ---------------------------------------------------------------------------

import {
	type Contact,
	type CorporateMembershipRecord,
	CorporateMembershipRecordSchema,
	type EmailField,
	type IndividualMemberRecord,
	IndividualMemberRecordSchema,
	type MembershipType,
} from "@/lib/glueup/schemas";
import { logSyncWarning } from "@/lib/monitoring/sync-logger";
import type { CorporateMember, IndividualMember, Member } from "./types";

export const UNMAPPED_PLAN = "unmapped";
export const UNKNOWN_CORPORATION = "Unknown Corporation";

export interface NormalizationResult {
	members: Member[];
	/** Records (or contacts) whose email resolved to an empty string */
	droppedEmpty: number;
	/** Records that failed validation and were omitted */
	failed: number;
}

export function normalizeEmail(email: string | null | undefined): string {
	return (email ?? "").trim().toLowerCase();
}

/** Unwraps `{ value }` or accepts a bare string. */
export function extractEmail(field: EmailField | null | undefined): string {
	if (field == null) return "";
	if (typeof field === "string") return normalizeEmail(field);
	return normalizeEmail(field.value);
}

function displayName(contact: Contact): string {
	return `${contact.givenName ?? ""} ${contact.familyName ?? ""}`.trim();
}

export function planSlug(membershipType: MembershipType | null | undefined): string {
	for (const candidate of [membershipType?.title, membershipType?.internalTitle]) {
		const trimmed = candidate?.trim();
		if (trimmed) return trimmed.toLowerCase();
	}
	return UNMAPPED_PLAN;
}

export function normalizeIndividualMember(record: IndividualMemberRecord): IndividualMember {
	const contact: Contact = record.individualMember ?? {};
	return {
		email: extractEmail(contact.emailAddress),
		displayName: displayName(contact),
		planSlug: planSlug(record.membership?.membershipType),
		memberKind: "individual",
	};
}

/** Admin contact first, then each member contact in record order. */
export function normalizeCorporateMembership(record: CorporateMembershipRecord): CorporateMember[] {
	const plan = planSlug(record.membership?.membershipType);
	const corporateName = record.membership?.name?.trim() || UNKNOWN_CORPORATION;

	const toMember = (contact: Contact, kind: CorporateMember["memberKind"]): CorporateMember => ({
		email: extractEmail(contact.emailAddress),
		displayName: displayName(contact),
		planSlug: plan,
		memberKind: kind,
		corporateName,
	});

	const members: CorporateMember[] = [];
	if (record.adminContact) members.push(toMember(record.adminContact, "corporate_admin"));
	for (const contact of record.memberContacts ?? []) {
		members.push(toMember(contact, "corporate_contact"));
	}
	return members;
}

/**
 * Validate and normalize raw directory records. A malformed record is logged
 * and omitted; the remaining records are still processed.
 */
export function normalizeMembers(
	individualRecords: readonly unknown[],
	corporateRecords: readonly unknown[],
	jobId: string,
): NormalizationResult {
	const result: NormalizationResult = { members: [], droppedEmpty: 0, failed: 0 };

	const accept = (member: Member) => {
		if (member.email) {
			result.members.push(member);
		} else {
			result.droppedEmpty++;
		}
	};

	individualRecords.forEach((raw, position) => {
		const parsed = IndividualMemberRecordSchema.safeParse(raw);
		if (!parsed.success) {
			result.failed++;
			logSyncWarning(
				jobId,
				"member",
				`individual#${position}`,
				`Malformed individual record: ${parsed.error.message}`,
			);
			return;
		}
		accept(normalizeIndividualMember(parsed.data));
	});

	corporateRecords.forEach((raw, position) => {
		const parsed = CorporateMembershipRecordSchema.safeParse(raw);
		if (!parsed.success) {
			result.failed++;
			logSyncWarning(
				jobId,
				"member",
				`corporate#${position}`,
				`Malformed corporate record: ${parsed.error.message}`,
			);
			return;
		}
		for (const member of normalizeCorporateMembership(parsed.data)) accept(member);
	});

	return result;
}
