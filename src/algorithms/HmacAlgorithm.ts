/**
 * HMAC Algorithms — HS256 / HS384 / HS512
 *
 * Symmetric signatures over the `header.claims` signing input.
 * Verification recomputes the MAC and compares in constant time.
 *
 * @module
 */
import { createHmac, timingSafeEqual, KeyObject } from 'node:crypto';
import type { Algorithm, JwtKey } from './types.js';

export type HmacHash = 'sha256' | 'sha384' | 'sha512';

/**
 * Create an HMAC strategy for the given JOSE name and digest.
 *
 * @example
 * ```typescript
 * const hs256 = createHmacAlgorithm('HS256', 'sha256');
 * ```
 */
export function createHmacAlgorithm(name: string, hash: HmacHash): Algorithm {
    const mac = (key: JwtKey, data: string): Buffer =>
        createHmac(hash, toSecret(key, name)).update(data, 'utf8').digest();

    return Object.freeze({
        name,
        sign(key: JwtKey, data: string): Uint8Array {
            return mac(key, data);
        },
        verify(key: JwtKey, data: string, signature: Uint8Array): boolean {
            const expected = mac(key, data);
            if (expected.length !== signature.length) return false;
            return timingSafeEqual(expected, signature);
        },
    });
}

const PEM_MARKER = '-----BEGIN';

/**
 * Reject asymmetric key material: an RSA public key must never be
 * accepted as an HMAC secret, whether as a KeyObject or as PEM text.
 * @internal
 */
function toSecret(key: JwtKey, name: string): string | Uint8Array | KeyObject {
    if (key instanceof KeyObject) {
        if (key.type !== 'secret') {
            throw new Error(`${name} requires a symmetric secret, received a ${key.type} key`);
        }
        return key;
    }
    const text = typeof key === 'string' ? key : Buffer.from(key).toString('latin1');
    if (text.includes(PEM_MARKER)) {
        throw new Error(`${name} requires a symmetric secret, received PEM key material`);
    }
    return key;
}

export const HS256 = createHmacAlgorithm('HS256', 'sha256');
export const HS384 = createHmacAlgorithm('HS384', 'sha384');
export const HS512 = createHmacAlgorithm('HS512', 'sha512');
