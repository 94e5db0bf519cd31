// ---------------------------------------------------------------------------
// Shared JSON-over-HTTP transport for the Glue Up and Circle clients
// Throttling (p-throttle), retry with backoff (p-retry), Zod-validated bodies
// ---------------------------------------------------------------------------

import pRetry, { AbortError } from "p-retry";
import pThrottle from "p-throttle";
import type { z } from "zod";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface ApiClientOptions {
	/** Short service name used in error messages, e.g. "Circle" */
	service: string;
	baseUrl: string;
	/** Produces the auth headers for one attempt; called again on every retry */
	getHeaders: (method: HttpMethod) => Promise<Record<string, string>>;
	/** Requests per second (default: 5) */
	rateLimit?: number;
	/** Max retries on failure (default: 4) */
	maxRetries?: number;
	/** First backoff delay in ms (default: 1000) */
	minRetryTimeoutMs?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export interface RequestOptions<T> {
	query?: Record<string, QueryValue>;
	body?: unknown;
	headers?: Record<string, string>;
	schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export class ApiError extends Error {
	constructor(
		public readonly service: string,
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`${service} API error ${status} (${statusText}) for ${url}`);
		this.name = "ApiError";
	}
}

/** The response arrived but did not match the envelope expected for the endpoint. */
export class ApiResponseShapeError extends Error {
	constructor(
		public readonly service: string,
		public readonly url: string,
		public readonly issues: string[],
	) {
		super(`${service} returned an unexpected response shape for ${url}: ${issues.join("; ")}`);
		this.name = "ApiResponseShapeError";
	}
}

/**
 * HTTP client core shared by the registry clients.
 *
 * - Fresh auth headers per attempt
 * - Rate limiting via p-throttle
 * - Automatic retry on 5xx/429/network errors via p-retry (exponential, jitter)
 * - Retry-After header support for 429 responses
 * - Other 4xx responses abort immediately
 * - Zod validation of every response body
 */
export class ApiClient {
	readonly service: string;
	private readonly baseUrl: string;
	private readonly getHeaders: (method: HttpMethod) => Promise<Record<string, string>>;
	private readonly maxRetries: number;
	private readonly minRetryTimeoutMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly throttledFetch: (url: string, init: RequestInit) => Promise<Response>;

	constructor(options: ApiClientOptions) {
		this.service = options.service;
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.getHeaders = options.getHeaders;
		this.maxRetries = options.maxRetries ?? 4;
		this.minRetryTimeoutMs = options.minRetryTimeoutMs ?? 1000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const throttle = pThrottle({
			limit: options.rateLimit ?? 5,
			interval: 1000,
		});

		this.throttledFetch = throttle((url: string, init: RequestInit) => this.fetchFn(url, init));
	}

	async request<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<T> {
		const url = this.buildUrl(path, options.query);

		const response = await pRetry(
			async () => {
				const authHeaders = await this.getHeaders(method);
				const res = await this.throttledFetch(url, {
					method,
					headers: {
						Accept: "application/json",
						...(options.body !== undefined ? { "Content-Type": "application/json" } : {}),
						...authHeaders,
						...options.headers,
					},
					body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
				});

				if (res.status === 429) {
					const retryAfter = res.headers.get("Retry-After");
					const delayMs = retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : 5000;
					await this.delay(Number.isFinite(delayMs) ? delayMs : 5000);
					throw new ApiError(this.service, res.status, res.statusText, "", url);
				}

				if (res.status >= 500) {
					const responseBody = await res.text();
					throw new ApiError(this.service, res.status, res.statusText, responseBody, url);
				}

				// Client errors will not succeed on retry
				if (!res.ok) {
					const responseBody = await res.text();
					throw new AbortError(
						new ApiError(this.service, res.status, res.statusText, responseBody, url),
					);
				}

				return res;
			},
			{
				retries: this.maxRetries,
				minTimeout: this.minRetryTimeoutMs,
				factor: 2,
				randomize: true,
			},
		);

		return this.parseBody(url, await response.text(), options.schema);
	}

	private parseBody<T>(url: string, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
		let json: unknown = {};
		if (text.trim().length > 0) {
			try {
				json = JSON.parse(text);
			} catch {
				throw new ApiResponseShapeError(this.service, url, ["body is not valid JSON"]);
			}
		}

		const result = schema.safeParse(json);
		if (!result.success) {
			throw new ApiResponseShapeError(
				this.service,
				url,
				result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
			);
		}
		return result.data;
	}

	private buildUrl(path: string, query?: Record<string, QueryValue>): string {
		const normalizedPath = path.startsWith("/") ? path : `/${path}`;
		const params = new URLSearchParams();
		for (const [key, value] of Object.entries(query ?? {})) {
			if (value !== undefined) params.append(key, String(value));
		}
		const qs = params.toString();
		return `${this.baseUrl}${normalizedPath}${qs ? `?${qs}` : ""}`;
	}

	private delay(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}
