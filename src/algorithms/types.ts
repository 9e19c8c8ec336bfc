/**
 * Algorithm strategy contract and key types.
 *
 * @module
 */
import { KeyObject } from 'node:crypto';

/**
 * A concrete signing or verification key.
 *
 * - HMAC: the shared secret as a string, bytes, or a `secret` KeyObject
 * - RSA: a PEM string or buffer, or a `private`/`public` KeyObject
 */
export type JwtKey = string | Uint8Array | KeyObject;

/**
 * Keys addressed by the `kid` header field.
 */
export type JwtKeySet =
    | ReadonlyMap<string | number, JwtKey>
    | { readonly [kid: string]: JwtKey };

/** Anything `verify()` accepts as its key argument. */
export type JwtKeyInput = JwtKey | JwtKeySet;

/**
 * A named pair of pure signing/verification functions.
 *
 * Implementations must be stateless. Throwing from either function is
 * reported by the registry as `SIGNING_FAILURE`/`VERIFICATION_FAILURE`.
 */
export interface Algorithm {
    /** JOSE identifier written to the `alg` header (e.g. `'HS256'`). */
    readonly name: string;
    sign(key: JwtKey, data: string): Uint8Array;
    verify(key: JwtKey, data: string, signature: Uint8Array): boolean;
}

/** Registered algorithm identifiers. */
export const JwtAlgorithm = {
    HS256: 'HS256',
    HS384: 'HS384',
    HS512: 'HS512',
    RS256: 'RS256',
    RS384: 'RS384',
    RS512: 'RS512',
} as const;

export type JwtAlgorithmName = typeof JwtAlgorithm[keyof typeof JwtAlgorithm];

/** True for a value usable as a single {@link JwtKey}. */
export function isJwtKey(value: unknown): value is JwtKey {
    return typeof value === 'string' || value instanceof Uint8Array || value instanceof KeyObject;
}
