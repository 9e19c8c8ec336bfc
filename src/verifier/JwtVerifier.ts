/**
 * JWT Verifier — One-Call Token Verification
 *
 * Wraps `Jwt.decode()` + `jwt.verify()` behind a configured instance
 * and reports the outcome as a result object instead of throwing.
 *
 * Supports:
 * - HS256/384/512 and RS256/384/512 (or any algorithm in a custom registry)
 * - A single key, or a key set selected by the `kid` header
 * - An `alg` allowlist, checked before any key is used
 * - Claims validation: `aud`, `exp`, `iat`, `nbf` with leeway
 *
 * @example
 * ```ts
 * import { JwtVerifier } from 'compact-jwt';
 *
 * // Shared secret
 * const verifier = new JwtVerifier({ key: 'test-secret', algorithms: ['HS256'] });
 *
 * // Rotating RSA keys
 * const verifier = new JwtVerifier({
 *     keys: { '2024-01': publicKeyA, '2024-07': publicKeyB },
 *     audience: 'billing-api',
 *     leeway: 30,
 * });
 *
 * const payload = verifier.verify(token);
 * if (payload) console.log(payload['sub']);
 * ```
 */
import { JwtError } from '../errors/JwtError.js';
import { attempt } from '../core/result.js';
import { Jwt } from '../token/Jwt.js';
import { readNumericDate } from '../token/ClaimValidator.js';
import { resolveJwtOptions, systemClock, type Clock, type JwtOptions, type ResolvedJwtOptions } from '../config/JwtConfig.js';
import type { JwtErrorCode } from '../errors/JwtError.js';
import type { JsonObject } from '../encoding/JsonCodec.js';
import type { JwtKey, JwtKeyInput, JwtKeySet } from '../algorithms/types.js';

// ============================================================================
// Types
// ============================================================================

export interface JwtVerifierConfig extends JwtOptions {
    /** Key used when the token carries no `kid`, or when no key set is given. */
    readonly key?: JwtKey | undefined;

    /** Keys addressed by the `kid` header field. */
    readonly keys?: JwtKeySet | undefined;

    /** Audience this service identifies as; required for tokens carrying `aud`. */
    readonly audience?: string | undefined;

    /** Accepted `alg` values. Default: every algorithm in the registry */
    readonly algorithms?: readonly string[] | undefined;
}

/** The decoded claim set. */
export type JwtPayload = JsonObject;

export interface JwtVerifyResult {
    /** Whether the token is valid */
    readonly valid: boolean;
    /** Decoded header (only present if valid) */
    readonly header?: JsonObject;
    /** Decoded payload (only present if valid) */
    readonly payload?: JwtPayload;
    /** Error code (only present if invalid) */
    readonly code?: JwtErrorCode;
    /** Error reason (only present if invalid) */
    readonly reason?: string;
}

// ============================================================================
// JwtVerifier
// ============================================================================

export class JwtVerifier {
    private readonly _config: JwtVerifierConfig;
    private readonly _options: ResolvedJwtOptions;
    private readonly _algorithms: ReadonlySet<string> | null;
    private readonly _defaultKey: JwtKeyInput;

    constructor(config: JwtVerifierConfig) {
        const defaultKey = config.key ?? config.keys;
        if (defaultKey === undefined) {
            throw new Error('JwtVerifier requires at least one of: key, keys');
        }
        this._config = config;
        this._defaultKey = defaultKey;
        this._options = resolveJwtOptions(config);

        if (config.algorithms) {
            const unknown = config.algorithms.filter((name) => !this._options.registry.has(name));
            if (unknown.length > 0) {
                throw new Error(`JwtVerifier: unsupported algorithms in allowlist: ${unknown.join(', ')}`);
            }
            this._algorithms = new Set(config.algorithms);
        } else {
            this._algorithms = null;
        }
    }

    // ── Public API ───────────────────────────────────────

    /**
     * Verify a JWT and return the decoded payload.
     *
     * @param token - Raw JWT string (a `Bearer ` prefix is stripped)
     * @returns The decoded payload, or `null` if verification fails
     */
    verify(token: string): JwtPayload | null {
        const result = this.verifyDetailed(token);
        return result.valid && result.payload ? result.payload : null;
    }

    /**
     * Verify a JWT with detailed result including error code and reason.
     */
    verifyDetailed(token: string): JwtVerifyResult {
        if (!token || typeof token !== 'string') {
            return { valid: false, code: 'INVALID_TOKEN', reason: 'Token is empty or not a string' };
        }

        const raw = token.startsWith('Bearer ') ? token.slice(7) : token;

        const result = attempt(() => {
            const jwt = Jwt.decode(raw, this._options);
            this._checkAlgorithm(jwt);
            jwt.verify(this._selectKey(jwt), this._config.audience);
            return jwt;
        });

        if (!result.ok) {
            return { valid: false, code: result.error.code, reason: result.error.message };
        }
        return { valid: true, header: result.value.getHeader(), payload: result.value.getClaims() };
    }

    // ── Internals ────────────────────────────────────────

    /** @internal */
    private _checkAlgorithm(jwt: Jwt): void {
        if (!this._algorithms) return;
        const algorithm = jwt.algorithm;
        if (algorithm === undefined || !this._algorithms.has(algorithm)) {
            throw new JwtError('UNSUPPORTED_ALGORITHM', `Algorithm not allowed: ${algorithm ?? 'none'}`);
        }
    }

    /**
     * The key set when the token names a `kid`, otherwise the single key
     * (or the key set, when no single key is configured).
     * @internal
     */
    private _selectKey(jwt: Jwt): JwtKeyInput {
        const keys = this._config.keys;
        if (keys !== undefined && jwt.getHeaderField('kid') !== undefined) return keys;
        return this._defaultKey;
    }

    // ── Utilities ────────────────────────────────────────

    /**
     * Decode a JWT payload WITHOUT verifying the signature.
     * Useful for inspecting tokens in logging/debugging.
     *
     * ⚠️ Never trust decoded-only payloads for authorization decisions.
     */
    static decode(token: string): JwtPayload | null {
        const result = Jwt.tryDecode(token);
        return result.ok ? result.value.getClaims() : null;
    }

    /**
     * Check if a token is expired without verifying its signature.
     * Returns `true` when the token is unparseable or its `exp` is malformed;
     * a token without `exp` never expires.
     */
    static isExpired(token: string, leeway = 0, clock: Clock = systemClock): boolean {
        const decoded = Jwt.tryDecode(token);
        if (!decoded.ok) return true;

        const claims = new Map(decoded.value.claims());
        const exp = attempt(() => readNumericDate(claims, 'exp'));
        if (!exp.ok) return true;
        return exp.value !== undefined && clock() - leeway >= exp.value;
    }
}
