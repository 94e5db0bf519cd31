// ---------------------------------------------------------------------------
// Circle Admin API Client
// Spaces, space memberships, community members and events
// ---------------------------------------------------------------------------

import { ConfigurationError } from "@/lib/config";
import { ApiClient, type ApiClientOptions } from "@/lib/http/client";
import type {
	CreatedTargetEvent,
	MemberInvite,
	TargetEventPayload,
	TargetMember,
	TargetMemberPage,
	TargetRegistry,
	TargetSpace,
} from "@/lib/sync/types";
import type { z } from "zod";
import {
	CircleCommunityMembersPageSchema,
	CircleCreatedEventSchema,
	CircleMemberSearchSchema,
	CircleSpaceMembersPageSchema,
	CircleSpacesPageSchema,
	CircleWriteAckSchema,
} from "./schemas";

export const CIRCLE_ENDPOINTS = {
	spaces: "/spaces",
	spaceMembers: "/space_members",
	communityMembers: "/community_members",
	communityMemberSearch: "/community_members/search",
	events: "/events",
} as const;

const PER_PAGE = 100;

export interface CircleClientOptions
	extends Pick<ApiClientOptions, "baseUrl" | "rateLimit" | "maxRetries" | "minRetryTimeoutMs" | "fetchFn"> {
	apiToken: string;
	/** Community member id that owns created events */
	eventOwnerId?: string;
	/** Looked up when no owner id is configured */
	eventOwnerEmail?: string;
}

/** Split a display name into Circle's first/last name fields. */
export function splitName(name: string): { first_name: string; last_name: string } {
	const trimmed = name.trim();
	const idx = trimmed.search(/\s/);
	if (idx === -1) return { first_name: trimmed, last_name: "" };
	return { first_name: trimmed.slice(0, idx), last_name: trimmed.slice(idx).trim() };
}

export class CircleClient implements TargetRegistry {
	private readonly api: ApiClient;
	private readonly eventOwnerId?: string;
	private readonly eventOwnerEmail?: string;

	constructor(options: CircleClientOptions) {
		const { apiToken } = options;
		this.eventOwnerId = options.eventOwnerId;
		this.eventOwnerEmail = options.eventOwnerEmail;
		this.api = new ApiClient({
			service: "Circle",
			baseUrl: options.baseUrl,
			rateLimit: options.rateLimit,
			maxRetries: options.maxRetries,
			minRetryTimeoutMs: options.minRetryTimeoutMs,
			fetchFn: options.fetchFn,
			getHeaders: async () => ({ Authorization: `Bearer ${apiToken}` }),
		});
	}

	// ── Spaces ────────────────────────────────────────────────────────────

	async listGroups(): Promise<TargetSpace[]> {
		const records = await this.collectPages(CIRCLE_ENDPOINTS.spaces, CircleSpacesPageSchema);
		return records.map((space) => ({ id: space.id, name: space.name ?? "" }));
	}

	async listGroupMembers(spaceId: string, page: number): Promise<TargetMemberPage> {
		const envelope = await this.api.request("GET", CIRCLE_ENDPOINTS.spaceMembers, {
			query: { space_id: spaceId, page, per_page: PER_PAGE },
			schema: CircleSpaceMembersPageSchema,
		});
		return {
			records: envelope.records.map((m) => ({ id: m.id ?? null, email: m.email ?? null })),
			hasMore: envelope.has_next_page,
		};
	}

	async addMemberToGroup(email: string, spaceId: string): Promise<void> {
		await this.api.request("POST", CIRCLE_ENDPOINTS.spaceMembers, {
			body: { email, space_id: spaceId },
			schema: CircleWriteAckSchema,
		});
	}

	async removeMemberFromGroup(email: string, spaceId: string): Promise<void> {
		await this.api.request("DELETE", CIRCLE_ENDPOINTS.spaceMembers, {
			query: { email, space_id: spaceId },
			schema: CircleWriteAckSchema,
		});
	}

	// ── Community members ─────────────────────────────────────────────────

	/** Circle treats a repeat invite for an existing address as a no-op. */
	async inviteMember(invite: MemberInvite): Promise<void> {
		const body: Record<string, unknown> = { email: invite.email };
		if (invite.name.trim()) Object.assign(body, splitName(invite.name));
		if (invite.spaceIds.length > 0) body.space_ids = invite.spaceIds;
		if (invite.tags.length > 0) body.tags = invite.tags;

		await this.api.request("POST", CIRCLE_ENDPOINTS.communityMembers, {
			body,
			schema: CircleWriteAckSchema,
		});
	}

	async listAllMembers(): Promise<TargetMember[]> {
		const records = await this.collectPages(
			CIRCLE_ENDPOINTS.communityMembers,
			CircleCommunityMembersPageSchema,
		);
		return records.map((m) => ({ id: m.id ?? null, email: m.email ?? null }));
	}

	// ── Events ────────────────────────────────────────────────────────────

	async createEvent(payload: TargetEventPayload, spaceId: string): Promise<CreatedTargetEvent> {
		const created = await this.api.request("POST", CIRCLE_ENDPOINTS.events, {
			query: { space_id: spaceId },
			body: { event: payload },
			schema: CircleCreatedEventSchema,
		});
		return { id: created.id, slug: created.slug ?? null };
	}

	async updateEvent(eventId: string, payload: TargetEventPayload): Promise<void> {
		await this.api.request("PUT", `${CIRCLE_ENDPOINTS.events}/${encodeURIComponent(eventId)}`, {
			query: { space_id: payload.space_id },
			body: { event: payload },
			schema: CircleWriteAckSchema,
		});
	}

	async deleteEvent(eventId: string, spaceId: string): Promise<void> {
		await this.api.request("DELETE", `${CIRCLE_ENDPOINTS.events}/${encodeURIComponent(eventId)}`, {
			query: { space_id: spaceId },
			schema: CircleWriteAckSchema,
		});
	}

	/**
	 * Community member id used as the owner of created events: the configured
	 * id, otherwise the member found for the configured email.
	 */
	async resolveOwnerIdentity(): Promise<string> {
		if (this.eventOwnerId) return this.eventOwnerId;
		if (!this.eventOwnerEmail) {
			throw new ConfigurationError(
				"Event owner not configured: set CIRCLE_EVENT_OWNER_ID or CIRCLE_EVENT_OWNER_EMAIL",
			);
		}

		const member = await this.api.request("GET", CIRCLE_ENDPOINTS.communityMemberSearch, {
			query: { email: this.eventOwnerEmail },
			schema: CircleMemberSearchSchema,
		});
		return member.id;
	}

	// ── Helpers ───────────────────────────────────────────────────────────

	private async collectPages<T>(
		path: string,
		schema: z.ZodType<{ records: T[]; has_next_page: boolean }, z.ZodTypeDef, unknown>,
	): Promise<T[]> {
		const all: T[] = [];
		let page = 1;

		for (;;) {
			const envelope = await this.api.request("GET", path, {
				query: { page, per_page: PER_PAGE },
				schema,
			});
			all.push(...envelope.records);
			if (!envelope.has_next_page) break;
			page += 1;
		}

		return all;
	}
}
