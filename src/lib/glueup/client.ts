// ---------------------------------------------------------------------------
// Glue Up API Client
// Membership directory and event listing with offset pagination
// ---------------------------------------------------------------------------

import { ApiClient, type ApiClientOptions } from "@/lib/http/client";
import type { SourceDirectory } from "@/lib/sync/types";
import type { GlueUpCredentialProvider } from "./auth";
import { GlueUpListEnvelopeSchema } from "./schemas";

export const GLUEUP_ENDPOINTS = {
	members: "/membershipDirectory/members",
	corporateMemberships: "/membershipDirectory/corporateMemberships",
	events: "/event/list",
} as const;

const PAGE_SIZE = 100;

const EVENT_PROJECTION = [
	"id",
	"title",
	"subTitle",
	"summary",
	"about",
	"description",
	"startDateTime",
	"endDateTime",
	"venueInfo.id",
	"venueInfo.name",
	"venueInfo.address",
	"venueInfo.city",
	"venueInfo.timezone",
	"venueInfo.country.name",
	"venueInfo.country.code",
	"venueInfo.map.latitude",
	"venueInfo.map.longitude",
	"template.images.banner.uri",
	"template.images.headerImage.uri",
	"published",
	"openToPublic",
];

interface ListFilter {
	projection: string;
	operator: "eq" | "gt";
	values: unknown[];
}

interface ListRequestBody {
	projection: string[];
	filter: ListFilter[];
	order: Record<string, "asc" | "desc">;
	offset: number;
	limit: number;
}

export interface GlueUpClientOptions
	extends Pick<ApiClientOptions, "baseUrl" | "rateLimit" | "maxRetries" | "minRetryTimeoutMs" | "fetchFn"> {
	credentials: Pick<GlueUpCredentialProvider, "currentCredentials">;
	organizationId: string;
	now?: () => number;
}

/**
 * Read-only client for the Glue Up directory.
 * Records are returned unvalidated; the normalizer and event engine parse
 * them per record so one malformed entry does not fail the whole listing.
 */
export class GlueUpClient implements SourceDirectory {
	private readonly api: ApiClient;
	private readonly organizationId: string;
	private readonly now: () => number;

	constructor(options: GlueUpClientOptions) {
		const { credentials } = options;
		this.organizationId = options.organizationId;
		this.now = options.now ?? Date.now;
		this.api = new ApiClient({
			service: "Glue Up",
			baseUrl: options.baseUrl,
			rateLimit: options.rateLimit,
			maxRetries: options.maxRetries,
			minRetryTimeoutMs: options.minRetryTimeoutMs,
			fetchFn: options.fetchFn,
			getHeaders: async (method) => {
				const { signature, token } = await credentials.currentCredentials(method);
				return { a: signature, token };
			},
		});
	}

	async listAllIndividualMembers(): Promise<unknown[]> {
		return this.paginate(GLUEUP_ENDPOINTS.members, (offset) => ({
			projection: [],
			filter: [],
			order: { familyName: "asc" },
			offset,
			limit: PAGE_SIZE,
		}));
	}

	async listAllCorporateMemberships(): Promise<unknown[]> {
		return this.paginate(GLUEUP_ENDPOINTS.corporateMemberships, (offset) => ({
			projection: [],
			filter: [],
			order: { name: "asc" },
			offset,
			limit: PAGE_SIZE,
		}));
	}

	/**
	 * List events. The cut-off for `futureOnly` is taken once so every page
	 * of one listing uses the same filter.
	 */
	async listEvents(publishedOnly: boolean, futureOnly: boolean): Promise<unknown[]> {
		const filter: ListFilter[] = [];
		if (publishedOnly) {
			filter.push({ projection: "published", operator: "eq", values: [true] });
		}
		if (futureOnly) {
			filter.push({ projection: "endDateTime", operator: "gt", values: [this.now()] });
		}

		return this.paginate(GLUEUP_ENDPOINTS.events, (offset) => ({
			projection: EVENT_PROJECTION,
			filter,
			order: { startDateTime: "asc" },
			offset,
			limit: PAGE_SIZE,
		}));
	}

	/** Offset pagination: keep requesting until a page comes back short. */
	private async paginate(
		path: string,
		buildBody: (offset: number) => ListRequestBody,
	): Promise<unknown[]> {
		const all: unknown[] = [];
		let offset = 0;

		for (;;) {
			const envelope = await this.api.request("POST", path, {
				body: buildBody(offset),
				headers: { requestOrganizationId: this.organizationId },
				schema: GlueUpListEnvelopeSchema,
			});
			const page = envelope.value ?? [];
			all.push(...page);

			if (page.length < PAGE_SIZE) break;
			offset += PAGE_SIZE;
		}

		return all;
	}
}
