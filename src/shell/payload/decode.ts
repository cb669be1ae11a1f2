// PURITY: SHELL (zlib)
// INVARIANT: decoded text is UTF-8 with invalid sequences replaced, never rejected
// COMPLEXITY: O(n)

import * as zlib from "node:zlib";

import { Effect } from "effect";
import { match } from "ts-pattern";

import { DecodeError, describeCause, PayloadTooLarge } from "../../core/errors.js";
import type { PayloadEncoding } from "../../core/types/index.js";

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

const utf8 = new TextDecoder("utf-8");

/**
 * Rejects payloads above `limit` bytes before any decoding work.
 */
export const enforcePayloadLimit = (
	payload: Uint8Array,
	limit: number,
): Effect.Effect<Uint8Array, PayloadTooLarge> =>
	payload.byteLength > limit
		? Effect.fail(new PayloadTooLarge({ size: payload.byteLength, limit }))
		: Effect.succeed(payload);

const decodeBase64 = (payload: Uint8Array): Effect.Effect<Uint8Array, DecodeError> => {
	const text = utf8.decode(payload).replace(/\s+/g, "");
	if (!BASE64_BODY.test(text) || text.length % 4 !== 0) {
		return Effect.fail(
			new DecodeError({ encoding: "base64", detail: "Incorrect padding or invalid characters" }),
		);
	}
	return Effect.succeed(Buffer.from(text, "base64"));
};

const gunzip = (payload: Uint8Array): Effect.Effect<Uint8Array, DecodeError> =>
	Effect.try({
		try: () => zlib.gunzipSync(payload),
		catch: (cause) => new DecodeError({ encoding: "gzip", detail: describeCause(cause) }),
	});

/**
 * Turns request bytes into source text.
 *
 * @example
 * ```ts
 * Effect.runSync(decodePayload(Buffer.from("eCA9IDE="), "base64")); // "x = 1"
 * ```
 */
export const decodePayload = (
	payload: Uint8Array,
	encoding: PayloadEncoding,
): Effect.Effect<string, DecodeError> =>
	Effect.map(
		match<PayloadEncoding, Effect.Effect<Uint8Array, DecodeError>>(encoding)
			.with("plain", () => Effect.succeed(payload))
			.with("base64", () => decodeBase64(payload))
			.with("gzip", () => gunzip(payload))
			.exhaustive(),
		(bytes) => utf8.decode(bytes),
	);

/**
 * Text the service reports for a payload that could not be turned into source.
 */
export const describePayloadError = (error: DecodeError | PayloadTooLarge): string =>
	match(error)
		.with({ _tag: "DecodeError", encoding: "base64" }, (e) => `Unable to decode base64: ${e.detail}`)
		.with({ _tag: "DecodeError", encoding: "gzip" }, (e) => `Unable to decompress Gzip: ${e.detail}`)
		.with(
			{ _tag: "PayloadTooLarge" },
			(e) => `Payload of ${e.size} bytes exceeds the limit of ${e.limit} bytes`,
		)
		.exhaustive();
