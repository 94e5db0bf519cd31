// ---------------------------------------------------------------------------
// Event Transformation
// Content checksum and directory event → community event payload mapping
// ---------------------------------------------------------------------------

import type { EventFieldOverrides, LocationType } from "@/lib/config";
import type { GlueUpEvent, NamedValue, VenueInfo } from "@/lib/glueup/schemas";
import { computeContentHash } from "./checksum";
import type { TargetEventPayload } from "./types";

export const DEFAULT_EVENT_TITLE = "Untitled Event";
export const MAX_SLUG_LENGTH = 100;
export const COVER_IMAGE_SIZE = "1200x630";

const SIZE_PLACEHOLDER = "::size::";
const VIRTUAL_KEYWORDS = ["online", "virtual", "webinar", "zoom", "teams", "meet"];

/**
 * Fingerprint of the fields that matter to the community copy of an event.
 * Field order in the source does not affect the result; absent fields hash
 * as null.
 */
export function computeEventChecksum(event: GlueUpEvent): string {
	const venue = event.venueInfo;
	return computeContentHash({
		title: event.title ?? null,
		subTitle: event.subTitle ?? null,
		about: event.about ?? null,
		summary: event.summary ?? null,
		description: event.description ?? null,
		startDateTime: event.startDateTime ?? null,
		endDateTime: event.endDateTime ?? null,
		venueName: venue?.name ?? null,
		venueAddress: venue?.address ?? null,
		venueCity: venue?.city ?? null,
		venueCountry: venue?.country ?? null,
		venueTimezone: venue?.timezone ?? null,
		templateImages: event.template?.images ?? null,
	});
}

/** Lowercase, strip non-word characters, collapse whitespace/hyphen runs. */
export function slugify(text: string): string {
	return text
		.toLowerCase()
		.replace(/[^\p{L}\p{N}_\s-]/gu, "")
		.replace(/[-\s]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, MAX_SLUG_LENGTH);
}

/**
 * Title slug shortened to leave room for the id suffix, which is never cut.
 */
export function buildEventSlug(title: string, id: string | null | undefined): string {
	const idPart = slugify(id ?? "");
	if (!idPart) return slugify(title);

	const titlePart = slugify(title)
		.slice(0, Math.max(MAX_SLUG_LENGTH - idPart.length - 1, 0))
		.replace(/-+$/, "");
	return titlePart ? `${titlePart}-${idPart}` : idPart;
}

/** Epoch milliseconds → ISO-8601 UTC; null for missing or invalid input. */
export function formatDateTime(timestampMs: number | null | undefined): string | null {
	if (!timestampMs) return null;
	const date = new Date(timestampMs);
	return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/** Text of a venue part given as a string or as `{ name | value | code }`. */
export function namedValueText(value: NamedValue | null | undefined): string | null {
	if (value == null) return null;
	if (typeof value === "string") return value || null;
	return value.name || value.value || value.code || null;
}

/** Venue name, address, city, country: comma-joined, absent parts omitted. */
export function buildLocationString(venue: VenueInfo | null | undefined): string {
	if (!venue) return "";
	return [venue.name, venue.address, venue.city, venue.country]
		.map(namedValueText)
		.filter((part): part is string => part !== null)
		.join(", ");
}

export function detectLocationType(venue: VenueInfo | null | undefined): LocationType {
	if (!venue) return "tbd";

	const name = (namedValueText(venue.name) ?? "").toLowerCase();
	if (VIRTUAL_KEYWORDS.some((keyword) => name.includes(keyword))) return "virtual";

	if (namedValueText(venue.address) || namedValueText(venue.city)) return "in_person";
	return "tbd";
}

/**
 * Banner image first, then header image. Relative paths cannot be resolved
 * against a known host and are omitted.
 */
export function extractCoverImageUrl(event: GlueUpEvent): string | undefined {
	const images = event.template?.images;
	for (const image of [images?.banner, images?.headerImage]) {
		const uri = image?.uri;
		if (!uri) continue;
		const resolved = uri.replaceAll(SIZE_PLACEHOLDER, COVER_IMAGE_SIZE);
		return resolved.startsWith("/") ? undefined : resolved;
	}
	return undefined;
}

function toCoordinate(value: number | string | null | undefined): number | null {
	if (value == null || value === "") return null;
	const n = typeof value === "number" ? value : Number(value);
	return Number.isFinite(n) ? n : null;
}

/**
 * Map a directory event to the community payload. The slug combines title
 * and source id, so equal titles still produce distinct slugs.
 */
export function transformEvent(
	event: GlueUpEvent,
	spaceId: string,
	ownerId: string,
	overrides: EventFieldOverrides,
): TargetEventPayload {
	const title = event.title || DEFAULT_EVENT_TITLE;
	const venue = event.venueInfo;

	let body = event.about || event.summary || event.description || "";
	if (event.subTitle) {
		body = `<p><strong>${event.subTitle}</strong></p>\n${body}`;
	}

	const payload: TargetEventPayload = {
		name: title,
		slug: buildEventSlug(title, event.id),
		body,
		starts_at: formatDateTime(event.startDateTime),
		ends_at: formatDateTime(event.endDateTime),
		location: buildLocationString(venue),
		location_type: overrides.locationType ?? detectLocationType(venue),
		host: overrides.host,
		rsvp_disabled: overrides.rsvpDisabled,
		send_email_confirmation: overrides.sendEmailConfirmation,
		send_email_reminder: overrides.sendEmailReminder,
		user_id: ownerId,
		space_id: spaceId,
	};

	const coverImageUrl = extractCoverImageUrl(event);
	if (coverImageUrl) payload.cover_image_url = coverImageUrl;
	if (venue?.timezone) payload.timezone = venue.timezone;

	if (venue) {
		const venueName = namedValueText(venue.name);
		const venueAddress = namedValueText(venue.address);
		const venueCity = namedValueText(venue.city);
		const venueCountry = namedValueText(venue.country);
		if (venueName) payload.venue_name = venueName;
		if (venueAddress) payload.venue_address = venueAddress;
		if (venueCity) payload.venue_city = venueCity;
		if (venueCountry) payload.venue_country = venueCountry;

		const latitude = toCoordinate(venue.map?.latitude);
		const longitude = toCoordinate(venue.map?.longitude);
		if (latitude !== null && longitude !== null) {
			payload.venue_latitude = latitude;
			payload.venue_longitude = longitude;
		}
	}

	return payload;
}
