// ---------------------------------------------------------------------------
// Unit Tests: Event Transformation & Checksum
// ---------------------------------------------------------------------------

import { EventFieldOverridesSchema } from "@/lib/config";
import type { GlueUpEvent } from "@/lib/glueup/schemas";
import {
	buildLocationString,
	computeEventChecksum,
	detectLocationType,
	extractCoverImageUrl,
	formatDateTime,
	slugify,
	transformEvent,
} from "@/lib/sync/event-transform";
import { describe, expect, it } from "vitest";

const overrides = EventFieldOverridesSchema.parse({});

const launch: GlueUpEvent = {
	id: "42",
	title: "Launch",
	subTitle: "Big day",
	about: "<p>Details</p>",
	startDateTime: 1700000000000,
	endDateTime: 1700003600000,
	venueInfo: {
		name: "Hall A",
		city: { name: "Berlin" },
		country: { code: "DE" },
		timezone: "Europe/Berlin",
		map: { latitude: "52.52", longitude: 13.405 },
	},
	template: {
		images: { banner: { uri: "https://cdn.example.com/img/::size::/banner.png" } },
	},
};

describe("slugify", () => {
	it("lowercases, strips punctuation and collapses separators", () => {
		expect(slugify("  Hello, World!  -- 2024 ")).toBe("hello-world-2024");
	});

	it("keeps letters outside ASCII", () => {
		expect(slugify("Café Über")).toBe("café-über");
	});

	it("truncates to 100 characters", () => {
		expect(slugify("a".repeat(150))).toHaveLength(100);
	});
});

describe("formatDateTime", () => {
	it("renders epoch milliseconds as ISO-8601 UTC", () => {
		expect(formatDateTime(1700000000000)).toBe("2023-11-14T22:13:20.000Z");
	});

	it("returns null for missing values", () => {
		expect(formatDateTime(null)).toBeNull();
		expect(formatDateTime(undefined)).toBeNull();
		expect(formatDateTime(0)).toBeNull();
	});
});

describe("location helpers", () => {
	it("joins the venue parts that are present", () => {
		expect(buildLocationString(launch.venueInfo)).toBe("Hall A, Berlin, DE");
		expect(buildLocationString(null)).toBe("");
	});

	it("detects virtual venues by keyword", () => {
		expect(detectLocationType({ name: "Zoom Webinar" })).toBe("virtual");
	});

	it("treats a venue with an address or city as in person", () => {
		expect(detectLocationType({ name: "Hall A", address: "Main St 1" })).toBe("in_person");
		expect(detectLocationType({ city: { value: "Paris" } })).toBe("in_person");
	});

	it("falls back to tbd", () => {
		expect(detectLocationType({})).toBe("tbd");
		expect(detectLocationType(undefined)).toBe("tbd");
	});
});

describe("extractCoverImageUrl", () => {
	it("substitutes the size placeholder in the banner", () => {
		expect(extractCoverImageUrl(launch)).toBe("https://cdn.example.com/img/1200x630/banner.png");
	});

	it("uses the header image when the banner has no uri", () => {
		const event: GlueUpEvent = {
			template: { images: { banner: { uri: null }, headerImage: { uri: "https://cdn.example.com/h.png" } } },
		};
		expect(extractCoverImageUrl(event)).toBe("https://cdn.example.com/h.png");
	});

	it("omits relative paths", () => {
		const event: GlueUpEvent = { template: { images: { banner: { uri: "/img/banner.png" } } } };
		expect(extractCoverImageUrl(event)).toBeUndefined();
	});
});

describe("transformEvent", () => {
	it("maps every field of a complete event", () => {
		expect(transformEvent(launch, "events", "owner-1", overrides)).toEqual({
			name: "Launch",
			slug: "launch-42",
			body: "<p><strong>Big day</strong></p>\n<p>Details</p>",
			starts_at: "2023-11-14T22:13:20.000Z",
			ends_at: "2023-11-14T23:13:20.000Z",
			location: "Hall A, Berlin, DE",
			location_type: "in_person",
			host: "Glue Up Events",
			rsvp_disabled: false,
			send_email_confirmation: true,
			send_email_reminder: true,
			user_id: "owner-1",
			space_id: "events",
			cover_image_url: "https://cdn.example.com/img/1200x630/banner.png",
			timezone: "Europe/Berlin",
			venue_name: "Hall A",
			venue_city: "Berlin",
			venue_country: "DE",
			venue_latitude: 52.52,
			venue_longitude: 13.405,
		});
	});

	it("fills defaults for a bare event", () => {
		const payload = transformEvent({ id: "7", summary: "Short" }, "events", "owner-1", overrides);

		expect(payload.name).toBe("Untitled Event");
		expect(payload.slug).toBe("untitled-event-7");
		expect(payload.body).toBe("Short");
		expect(payload.location).toBe("");
		expect(payload.location_type).toBe("tbd");
		expect(payload.starts_at).toBeNull();
		expect(payload).not.toHaveProperty("cover_image_url");
		expect(payload).not.toHaveProperty("venue_latitude");
	});

	it("gives same-titled events distinct slugs", () => {
		const a = transformEvent({ id: "1", title: "Meetup" }, "events", "o", overrides);
		const b = transformEvent({ id: "2", title: "Meetup" }, "events", "o", overrides);
		expect(a.slug).toBe("meetup-1");
		expect(b.slug).toBe("meetup-2");
	});

	it("keeps the id suffix when a long title is shortened", () => {
		const title = "Annual leadership summit ".repeat(5);
		const a = transformEvent({ id: "101", title }, "events", "o", overrides);
		const b = transformEvent({ id: "202", title }, "events", "o", overrides);

		const prefix = `${"annual-leadership-summit-".repeat(3)}annual-leadership-sum`;
		expect(a.slug).toBe(`${prefix}-101`);
		expect(b.slug).toBe(`${prefix}-202`);
		expect(a.slug).toHaveLength(100);
	});

	it("applies the configured location type over detection", () => {
		const virtualOnly = EventFieldOverridesSchema.parse({ locationType: "virtual", host: "Team" });
		const payload = transformEvent(launch, "events", "owner-1", virtualOnly);
		expect(payload.location_type).toBe("virtual");
		expect(payload.host).toBe("Team");
	});
});

describe("computeEventChecksum", () => {
	it("ignores field order", () => {
		const reordered: GlueUpEvent = {
			endDateTime: launch.endDateTime,
			about: launch.about,
			title: launch.title,
			venueInfo: launch.venueInfo,
			template: launch.template,
			startDateTime: launch.startDateTime,
			subTitle: launch.subTitle,
			id: launch.id,
		};
		expect(computeEventChecksum(reordered)).toBe(computeEventChecksum(launch));
	});

	it("changes when content changes", () => {
		expect(computeEventChecksum({ ...launch, title: "Relaunch" })).not.toBe(computeEventChecksum(launch));
	});

	it("ignores fields outside the fingerprint", () => {
		expect(computeEventChecksum({ ...launch, id: "99", published: true })).toBe(
			computeEventChecksum(launch),
		);
	});

	it("is a 64-character hex digest", () => {
		expect(computeEventChecksum({})).toMatch(/^[0-9a-f]{64}$/);
	});
});
