// ---------------------------------------------------------------------------
// Glue Up API: Zod Validation Schemas
// Raw directory records and the list envelope shared by the directory endpoints
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Envelope ---

/** `POST /membershipDirectory/*` and `POST /event/list` all answer `{ value: [...] }`. */
export const GlueUpListEnvelopeSchema = z.object({
	value: z.array(z.unknown()).nullable(),
});

// --- Shared fields ---

export const GlueUpIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/** Email arrives either as a bare string or wrapped as `{ value: "..." }`. */
export const EmailFieldSchema = z.union([
	z.string(),
	z.object({ value: z.string().nullish() }),
]);

export const ContactSchema = z.object({
	emailAddress: EmailFieldSchema.nullish(),
	givenName: z.string().nullish(),
	familyName: z.string().nullish(),
});

export const MembershipTypeSchema = z.object({
	title: z.string().nullish(),
	internalTitle: z.string().nullish(),
});

// --- Individual membership ---

export const IndividualMemberRecordSchema = z.object({
	membership: z
		.object({
			membershipType: MembershipTypeSchema.nullish(),
			status: z.string().nullish(),
		})
		.nullish(),
	individualMember: ContactSchema.nullish(),
});

// --- Corporate membership ---

export const CorporateMembershipRecordSchema = z.object({
	membership: z
		.object({
			name: z.string().nullish(),
			membershipType: MembershipTypeSchema.nullish(),
			status: z.string().nullish(),
		})
		.nullish(),
	adminContact: ContactSchema.nullish(),
	memberContacts: z.array(ContactSchema).nullish(),
});

// --- Event ---

/** Venue parts are strings, or objects carrying `name`/`value`/`code`. */
export const NamedValueSchema = z.union([
	z.string(),
	z.number().transform(String),
	z.object({
		name: z.string().nullish(),
		value: z.string().nullish(),
		code: z.string().nullish(),
	}),
]);

const CoordinateSchema = z.union([z.number(), z.string()]);

export const VenueInfoSchema = z.object({
	name: NamedValueSchema.nullish(),
	address: NamedValueSchema.nullish(),
	city: NamedValueSchema.nullish(),
	country: NamedValueSchema.nullish(),
	timezone: z.string().nullish(),
	map: z
		.object({
			latitude: CoordinateSchema.nullish(),
			longitude: CoordinateSchema.nullish(),
		})
		.nullish(),
});

const ImageRefSchema = z.object({ uri: z.string().nullish() });

export const EventTemplateSchema = z.object({
	images: z
		.object({
			banner: ImageRefSchema.nullish(),
			headerImage: ImageRefSchema.nullish(),
		})
		.nullish(),
});

export const GlueUpEventSchema = z.object({
	id: GlueUpIdSchema.nullish(),
	title: z.string().nullish(),
	subTitle: z.string().nullish(),
	about: z.string().nullish(),
	summary: z.string().nullish(),
	description: z.string().nullish(),
	startDateTime: z.number().nullish(),
	endDateTime: z.number().nullish(),
	venueInfo: VenueInfoSchema.nullish(),
	template: EventTemplateSchema.nullish(),
	published: z.boolean().nullish(),
	openToPublic: z.boolean().nullish(),
});

// --- Inferred types ---

export type EmailField = z.infer<typeof EmailFieldSchema>;
export type Contact = z.infer<typeof ContactSchema>;
export type MembershipType = z.infer<typeof MembershipTypeSchema>;
export type IndividualMemberRecord = z.infer<typeof IndividualMemberRecordSchema>;
export type CorporateMembershipRecord = z.infer<typeof CorporateMembershipRecordSchema>;
export type NamedValue = z.infer<typeof NamedValueSchema>;
export type VenueInfo = z.infer<typeof VenueInfoSchema>;
export type GlueUpEvent = z.infer<typeof GlueUpEventSchema>;
