/**
 * KeyResolver — `kid` Lookup in a Key Set
 *
 * When `verify()` receives a key set and the header names a `kid`, the
 * matching entry becomes the verification key. A missing entry yields
 * `undefined`, which the signature check then rejects.
 *
 * @module
 */
import { KeyObject } from 'node:crypto';
import { JwtError } from '../errors/JwtError.js';
import type { JwtKey, JwtKeySet } from '../algorithms/types.js';

export interface ResolvedKey {
    /** The key to verify with; `undefined` when the set has no entry for `kid` */
    readonly key: unknown;
    /** The `kid` used for the lookup, if any */
    readonly kid?: string | number | undefined;
}

/**
 * Resolve the verification key for a token.
 *
 * @param key - The caller's key argument
 * @param kid - The token's `kid` header field
 * @throws {JwtError} `INVALID_TOKEN` when a key set is given and `kid` is neither string nor number
 */
export function resolveKey(key: unknown, kid: unknown): ResolvedKey {
    if (!isKeySet(key) || kid === undefined || kid === null) {
        return { key };
    }

    if (typeof kid !== 'string' && !(typeof kid === 'number' && Number.isFinite(kid))) {
        throw new JwtError('INVALID_TOKEN', 'Invalid "kid" value. Unable to look up the key.');
    }

    return { key: lookup(key, kid), kid };
}

/**
 * A key set is a `Map` or a plain record. Strings, byte arrays and
 * KeyObjects are single keys.
 */
export function isKeySet(value: unknown): value is JwtKeySet {
    if (value instanceof Map) return true;
    if (typeof value !== 'object' || value === null) return false;
    if (value instanceof Uint8Array || value instanceof KeyObject) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Map keys keep their type, so `kid: 7` also matches `'7'` and
 * `kid: '7'` also matches `7`. Record keys are always strings.
 * @internal
 */
function lookup(keys: JwtKeySet, kid: string | number): unknown {
    if (isKeyMap(keys)) {
        if (keys.has(kid)) return keys.get(kid);
        const alternate = typeof kid === 'number' ? String(kid) : toIntegerKey(kid);
        return alternate !== undefined ? keys.get(alternate) : undefined;
    }

    const name = String(kid);
    return Object.prototype.hasOwnProperty.call(keys, name)
        ? keys[name]
        : undefined;
}

function isKeyMap(keys: JwtKeySet): keys is ReadonlyMap<string | number, JwtKey> {
    return keys instanceof Map;
}

function toIntegerKey(kid: string): number | undefined {
    return /^(?:0|-?[1-9]\d*)$/.test(kid) ? Number(kid) : undefined;
}
