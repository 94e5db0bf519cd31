// ---------------------------------------------------------------------------
// JSON request body parsing with Zod
// ---------------------------------------------------------------------------

import { ErrorCodes, createErrorResponse } from "@/lib/utils/api-response";
import type { Context } from "hono";
import type { z } from "zod";
import type { AppEnv } from "./context";

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: Response };

/** Read the raw JSON body. An empty body reads as `{}`. */
export async function readJson(c: Context<AppEnv>): Promise<ParsedBody<unknown>> {
	const text = await c.req.text();
	if (text.trim().length === 0) return { ok: true, data: {} };
	try {
		return { ok: true, data: JSON.parse(text) };
	} catch {
		return {
			ok: false,
			response: createErrorResponse(
				"Request body is not valid JSON",
				ErrorCodes.INVALID_INPUT,
				c.get("requestId"),
				400,
			),
		};
	}
}

export async function parseBody<T>(
	c: Context<AppEnv>,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<ParsedBody<T>> {
	const raw = await readJson(c);
	if (!raw.ok) return raw;

	const result = schema.safeParse(raw.data);
	if (!result.success) {
		return {
			ok: false,
			response: createErrorResponse(
				"Request body failed validation",
				ErrorCodes.VALIDATION_ERROR,
				c.get("requestId"),
				400,
				{ issues: result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`) },
			),
		};
	}
	return { ok: true, data: result.data };
}
