/**
 * AlgorithmRegistry — Explicit `alg` → Strategy Lookup
 *
 * An immutable table of {@link Algorithm} strategies keyed by their
 * JOSE identifier. The token looks its `alg` header up here; nothing is
 * resolved by name reflection. Registries are frozen on construction
 * and can be shared freely.
 *
 * @example
 * ```typescript
 * import { defaultAlgorithmRegistry, createHmacAlgorithm } from 'compact-jwt';
 *
 * // Add a strategy without touching the shared default
 * const registry = defaultAlgorithmRegistry.extend(myEdDsa);
 * const jwt = Jwt.create('EdDSA', { registry });
 * ```
 *
 * @module
 */
import { JwtError, toJwtError } from '../errors/JwtError.js';
import { HS256, HS384, HS512 } from './HmacAlgorithm.js';
import { RS256, RS384, RS512 } from './RsaAlgorithm.js';
import { isJwtKey, type Algorithm } from './types.js';

export class AlgorithmRegistry {
    private readonly _algorithms: ReadonlyMap<string, Algorithm>;

    constructor(algorithms: Iterable<Algorithm>) {
        const table = new Map<string, Algorithm>();
        for (const algorithm of algorithms) {
            if (table.has(algorithm.name)) {
                throw new Error(`Duplicate algorithm "${algorithm.name}" in registry`);
            }
            table.set(algorithm.name, algorithm);
        }
        this._algorithms = table;
        Object.freeze(this);
    }

    // ── Lookup ───────────────────────────────────────────

    has(name: unknown): boolean {
        return typeof name === 'string' && this._algorithms.has(name);
    }

    /**
     * @throws {JwtError} `UNSUPPORTED_ALGORITHM` when `name` is absent or unknown
     */
    get(name: unknown): Algorithm {
        const algorithm = typeof name === 'string' ? this._algorithms.get(name) : undefined;
        if (!algorithm) {
            const label = name === undefined || name === null ? 'none' : `"${String(name)}"`;
            throw new JwtError('UNSUPPORTED_ALGORITHM', `Unsupported algorithm: ${label}`);
        }
        return algorithm;
    }

    names(): string[] {
        return [...this._algorithms.keys()];
    }

    /** A new registry holding these strategies plus `algorithms`. */
    extend(...algorithms: Algorithm[]): AlgorithmRegistry {
        return new AlgorithmRegistry([...this._algorithms.values(), ...algorithms]);
    }

    // ── Dispatch ─────────────────────────────────────────

    /**
     * Sign `data` with the named algorithm.
     *
     * @throws {JwtError} `UNSUPPORTED_ALGORITHM` or `SIGNING_FAILURE`
     */
    sign(name: unknown, key: unknown, data: string): Uint8Array {
        const algorithm = this.get(name);
        if (!isJwtKey(key)) {
            throw new JwtError('SIGNING_FAILURE', `Unable to sign with ${algorithm.name}: unsupported key type`);
        }

        let signature: unknown;
        try {
            signature = algorithm.sign(key, data);
        } catch (err) {
            throw toJwtError(err, 'SIGNING_FAILURE', `Unable to sign with ${algorithm.name}`);
        }

        if (!(signature instanceof Uint8Array) || signature.length === 0) {
            throw new JwtError('SIGNING_FAILURE', `Unable to sign with ${algorithm.name}: empty signature`);
        }
        return signature;
    }

    /**
     * Verify `signature` over `data` with the named algorithm.
     *
     * @returns Whether the signature matches
     * @throws {JwtError} `UNSUPPORTED_ALGORITHM` or `VERIFICATION_FAILURE`
     */
    verify(name: unknown, key: unknown, data: string, signature: Uint8Array): boolean {
        const algorithm = this.get(name);
        if (!isJwtKey(key)) {
            throw new JwtError('VERIFICATION_FAILURE', `Unable to verify with ${algorithm.name}: unsupported key type`);
        }

        let verified: unknown;
        try {
            verified = algorithm.verify(key, data, signature);
        } catch (err) {
            throw toJwtError(err, 'VERIFICATION_FAILURE', `Unable to verify with ${algorithm.name}`);
        }

        if (typeof verified !== 'boolean') {
            throw new JwtError('VERIFICATION_FAILURE', `${algorithm.name} returned a non-boolean verification result`);
        }
        return verified;
    }
}

/** HS256/384/512 and RS256/384/512. */
export const defaultAlgorithmRegistry = new AlgorithmRegistry([
    HS256, HS384, HS512,
    RS256, RS384, RS512,
]);
