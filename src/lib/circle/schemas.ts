// ---------------------------------------------------------------------------
// Circle Admin API: Zod Validation Schemas
// One envelope parser per endpoint; ids are normalized to strings
// ---------------------------------------------------------------------------

import { z } from "zod";

export const CircleIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/** Paginated list endpoints answer `{ records: [...], has_next_page }`. */
export function paginatedEnvelope<T extends z.ZodTypeAny>(record: T) {
	return z.object({
		records: z.array(record),
		has_next_page: z.boolean(),
	});
}

export const CircleSpaceSchema = z.object({
	id: CircleIdSchema,
	name: z.string().nullish(),
});

export const CircleSpaceMemberSchema = z.object({
	id: CircleIdSchema.nullish(),
	email: z.string().nullish(),
});

export const CircleCommunityMemberSchema = z.object({
	id: CircleIdSchema.nullish(),
	email: z.string().nullish(),
	name: z.string().nullish(),
});

export const CircleSpacesPageSchema = paginatedEnvelope(CircleSpaceSchema);
export const CircleSpaceMembersPageSchema = paginatedEnvelope(CircleSpaceMemberSchema);
export const CircleCommunityMembersPageSchema = paginatedEnvelope(CircleCommunityMemberSchema);

/** `POST /events` returns the created event; the slug may be reassigned by Circle. */
export const CircleCreatedEventSchema = z.object({
	id: CircleIdSchema,
	slug: z.string().nullish(),
});

/** `GET /community_members/search` returns the single matching member. */
export const CircleMemberSearchSchema = z.object({
	id: CircleIdSchema,
	email: z.string().nullish(),
});

/** Write endpoints whose body carries nothing the bridge reads. */
export const CircleWriteAckSchema = z.unknown();

export type CircleSpace = z.infer<typeof CircleSpaceSchema>;
export type CircleSpaceMember = z.infer<typeof CircleSpaceMemberSchema>;
export type CircleCommunityMember = z.infer<typeof CircleCommunityMemberSchema>;
