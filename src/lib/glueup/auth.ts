// ---------------------------------------------------------------------------
// Glue Up Credential Provider
// Per-request HMAC signature + cached session token with double-checked refresh
// ---------------------------------------------------------------------------

import { createHash, createHmac } from "node:crypto";
import { z } from "zod";
import { SimpleMutex } from "../utils/mutex";

export class GlueUpAuthError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "GlueUpAuthError";
	}
}

/** Headers Glue Up expects on every authenticated request. */
export interface GlueUpCredentials {
	/** Value of the `a` header: `v=…;k=…;ts=…;d=…` */
	signature: string;
	/** Value of the `token` header */
	token: string;
}

export interface GlueUpCredentialProviderOptions {
	baseUrl: string;
	publicKey: string;
	privateKey: string;
	email: string;
	passphrase: string;
	/** API version embedded in the signature (default: "1.0") */
	version?: string;
	/** Refresh this long before the reported expiry (default: 60s) */
	expiryBufferMs?: number;
	/** Lifetime assumed when the session response carries no expiry (default: 15 min) */
	defaultTokenTtlMs?: number;
	fetchFn?: typeof fetch;
	now?: () => number;
}

const SESSION_ENDPOINT = "/v2/user/session";

const SessionResponseSchema = z.object({
	value: z.object({
		token: z.string().min(1),
		expiry: z.number().nullish(),
	}),
});

/**
 * Owns the Glue Up session token. Safe to share between concurrently handled
 * requests: a valid token is returned without locking, and only one caller at
 * a time may re-authenticate.
 */
export class GlueUpCredentialProvider {
	private readonly baseUrl: string;
	private readonly publicKey: string;
	private readonly privateKey: string;
	private readonly email: string;
	private readonly passphrase: string;
	private readonly version: string;
	private readonly expiryBufferMs: number;
	private readonly defaultTokenTtlMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly now: () => number;
	private readonly refreshLock = new SimpleMutex();

	private token: string | null = null;
	private tokenExpiry: number | null = null;

	constructor(options: GlueUpCredentialProviderOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.publicKey = options.publicKey;
		this.privateKey = options.privateKey;
		this.email = options.email;
		this.passphrase = options.passphrase;
		this.version = options.version ?? "1.0";
		this.expiryBufferMs = options.expiryBufferMs ?? 60_000;
		this.defaultTokenTtlMs = options.defaultTokenTtlMs ?? 15 * 60_000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Fresh credentials for one request. The signature is regenerated on every
	 * call; the token is reused until it nears expiry.
	 */
	async currentCredentials(method: string): Promise<GlueUpCredentials> {
		const token = await this.getToken();
		return { signature: this.sign(method), token };
	}

	/**
	 * Build the `a` header: `v=<version>;k=<publicKey>;ts=<ms>;d=<hex hmac>`.
	 * The digest covers `METHOD + publicKey + version + ts`.
	 */
	sign(method: string): string {
		const ts = this.now();
		const base = `${method.toUpperCase()}${this.publicKey}${this.version}${ts}`;
		const digest = createHmac("sha256", this.privateKey).update(base, "utf-8").digest("hex");
		return `v=${this.version};k=${this.publicKey};ts=${ts};d=${digest}`;
	}

	private isTokenValid(at: number): boolean {
		if (!this.token || this.tokenExpiry === null) return false;
		return at < this.tokenExpiry - this.expiryBufferMs;
	}

	private async getToken(): Promise<string> {
		// Fast path: no lock while the cached token is still good
		if (this.token && this.isTokenValid(this.now())) {
			return this.token;
		}

		return this.refreshLock.runExclusive(async () => {
			// Another caller may have refreshed while this one waited
			if (this.token && this.isTokenValid(this.now())) {
				return this.token;
			}
			return this.authenticate();
		});
	}

	private async authenticate(): Promise<string> {
		const url = `${this.baseUrl}${SESSION_ENDPOINT}`;
		const passphraseHash = createHash("md5").update(this.passphrase, "utf-8").digest("hex");

		let res: Response;
		try {
			res = await this.fetchFn(url, {
				method: "POST",
				headers: {
					a: this.sign("POST"),
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body: JSON.stringify({
					email: { value: this.email },
					passphrase: { value: passphraseHash },
				}),
			});
		} catch (err) {
			throw new GlueUpAuthError(
				`Authentication request failed: ${err instanceof Error ? err.message : String(err)}`,
			);
		}

		if (!res.ok) {
			throw new GlueUpAuthError(`Authentication failed with status ${res.status}`, res.status);
		}

		let json: unknown;
		try {
			json = await res.json();
		} catch {
			throw new GlueUpAuthError("Invalid JSON response from authentication endpoint");
		}

		const parsed = SessionResponseSchema.safeParse(json);
		if (!parsed.success) {
			throw new GlueUpAuthError("No token returned in authentication response");
		}

		this.token = parsed.data.value.token;
		this.tokenExpiry = parsed.data.value.expiry ?? this.now() + this.defaultTokenTtlMs;
		return this.token;
	}
}
