/**
 * JwtError — Typed Failure for Every JWT Operation
 *
 * All codec, signing, decoding and verification failures surface as a
 * single `JwtError` whose `code` tells them apart. Lower-level failures
 * (a malformed base64url segment inside a token, a rejected key) are
 * attached as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *     jwt.verify(secret, 'api');
 * } catch (e) {
 *     if (isJwtError(e, 'EXPIRED')) return refresh();
 *     throw e;
 * }
 * ```
 *
 * @module
 */

/**
 * Discriminant for {@link JwtError}.
 *
 * - `INVALID_ENCODING`: a segment is not URL-safe base64
 * - `SERIALIZATION_FAILURE`: malformed JSON, or JSON that is not an object
 * - `UNSUPPORTED_ALGORITHM`: `alg` missing or not registered
 * - `SIGNING_FAILURE` / `VERIFICATION_FAILURE`: the crypto primitive rejected the key or data
 * - `INVALID_TOKEN`: structural violation (segments, `typ`, `kid`, `aud`, time claims)
 * - `INVALID_SIGNATURE`: the signature does not verify
 * - `INVALID_AUDIENCE`, `EXPIRED`, `NOT_YET_VALID`: registered claim constraints
 */
export type JwtErrorCode =
    | 'INVALID_ENCODING'
    | 'SERIALIZATION_FAILURE'
    | 'UNSUPPORTED_ALGORITHM'
    | 'SIGNING_FAILURE'
    | 'VERIFICATION_FAILURE'
    | 'INVALID_TOKEN'
    | 'INVALID_SIGNATURE'
    | 'INVALID_AUDIENCE'
    | 'EXPIRED'
    | 'NOT_YET_VALID';

export class JwtError extends Error {
    /** Which rule the token or key broke. */
    readonly code: JwtErrorCode;

    constructor(code: JwtErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'JwtError';
        this.code = code;
    }
}

/**
 * Narrow an unknown thrown value to a {@link JwtError},
 * optionally of a specific code.
 */
export function isJwtError(value: unknown, code?: JwtErrorCode): value is JwtError {
    if (!(value instanceof JwtError)) return false;
    return code === undefined || value.code === code;
}

/**
 * Wrap a non-JwtError throwable under the given code. JwtErrors pass through.
 * @internal
 */
export function toJwtError(err: unknown, code: JwtErrorCode, message: string): JwtError {
    if (err instanceof JwtError) return err;
    const detail = err instanceof Error ? err.message : String(err);
    return new JwtError(code, `${message}: ${detail}`, { cause: err });
}
