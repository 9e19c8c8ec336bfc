/**
 * Jwt — Token Model, Encode and Decode/Verify Pipelines
 *
 * Holds an ordered header and an ordered claim set, serializes them to
 * the three-segment wire format, and verifies signatures together with
 * the registered `aud`/`exp`/`iat`/`nbf` constraints.
 *
 * The token caches its wire string (`hash`). The cache is exactly the
 * last `encode()` output or the verbatim `decode()` input, and every
 * header or claim mutation clears it. Verification always runs over the
 * cached bytes, so a decoded token verifies even when its JSON is not
 * in canonical form.
 *
 * @example
 * ```typescript
 * import { Jwt } from 'compact-jwt';
 *
 * const jwt = Jwt.create('HS256');
 * jwt.setClaim('sub', 'user-1');
 * jwt.setClaim('exp', Math.floor(Date.now() / 1000) + 3600);
 * const token = jwt.encode('test-secret');
 *
 * const decoded = Jwt.decode(token, { leeway: 30 });
 * decoded.verify('test-secret');
 * decoded.getClaim('sub'); // 'user-1'
 * ```
 *
 * @module
 */
import { JwtError, isJwtError } from '../errors/JwtError.js';
import { attempt, type Result } from '../core/result.js';
import { base64UrlDecode, base64UrlDecodeToString, base64UrlEncode } from '../encoding/Base64Url.js';
import { jsonDecode, jsonEncode, type JsonObject, type JsonValue } from '../encoding/JsonCodec.js';
import { resolveJwtOptions, type JwtOptions, type ResolvedJwtOptions } from '../config/JwtConfig.js';
import type { JwtDebugEvent } from '../observability/DebugObserver.js';
import type { JwtAlgorithmName, JwtKey, JwtKeyInput } from '../algorithms/types.js';
import { resolveKey } from './KeyResolver.js';
import { validateRegisteredClaims } from './ClaimValidator.js';

export class Jwt implements Iterable<[string, JsonValue]> {
    private readonly _options: ResolvedJwtOptions;
    private readonly _header = new Map<string, JsonValue>();
    private readonly _claims = new Map<string, JsonValue>();
    private _algorithm: JsonValue | undefined;
    private _hash: string | null = null;

    /**
     * An empty token: no header fields, no claims.
     * Prefer {@link Jwt.create} or {@link Jwt.decode}.
     *
     * @throws {JwtConfigError} When `options` fail validation
     */
    constructor(options?: JwtOptions) {
        this._options = resolveJwtOptions(options);
    }

    // ── Factories ────────────────────────────────────────

    /**
     * A fresh token whose header is `{ alg, typ: 'JWT' }`.
     */
    static create(algorithm: JwtAlgorithmName | (string & {}), options?: JwtOptions): Jwt {
        const jwt = new Jwt(options);
        jwt.setHeaderField('alg', algorithm);
        jwt.setHeaderField('typ', 'JWT');
        return jwt;
    }

    /**
     * Parse a wire string into a token. The signature is NOT checked;
     * call {@link Jwt.verify} before trusting any claim.
     *
     * @throws {JwtError} `INVALID_TOKEN`, with the codec error as `cause` where there is one
     */
    static decode(hash: string, options?: JwtOptions): Jwt {
        const jwt = new Jwt(options);
        const start = jwt._startTimer();
        try {
            jwt._initialize(hash);
        } catch (err) {
            jwt._emit('decode', start, err);
            throw err;
        }
        jwt._emit('decode', start);
        return jwt;
    }

    /** {@link Jwt.decode} without throwing. */
    static tryDecode(hash: string, options?: JwtOptions): Result<Jwt> {
        return attempt(() => Jwt.decode(hash, options));
    }

    // ── Header ───────────────────────────────────────────

    getHeaderField(name: string): JsonValue | undefined {
        return this._header.get(name);
    }

    /**
     * Set a header field and clear the cached hash.
     * Writing `alg` selects the algorithm used by `encode()` and `verify()`.
     */
    setHeaderField(name: string, value: JsonValue): void {
        this._header.set(name, value);
        if (name === 'alg') {
            this._algorithm = value;
        }
        this._hash = null;
    }

    /** Snapshot of the header, in insertion order. */
    getHeader(): JsonObject {
        return Object.fromEntries(this._header);
    }

    /** The `alg` header value, when it is a string. */
    get algorithm(): string | undefined {
        return typeof this._algorithm === 'string' ? this._algorithm : undefined;
    }

    // ── Claims ───────────────────────────────────────────

    getClaim(name: string): JsonValue | undefined {
        return this._claims.get(name);
    }

    /** Set a claim and clear the cached hash. */
    setClaim(name: string, value: JsonValue): void {
        this._claims.set(name, value);
        this._hash = null;
    }

    /** True when the claim exists and is not `null`. */
    hasClaim(name: string): boolean {
        const value = this._claims.get(name);
        return value !== undefined && value !== null;
    }

    /**
     * Remove a claim. The cached hash is cleared only if the claim existed.
     *
     * @returns Whether a claim was removed
     */
    removeClaim(name: string): boolean {
        if (!this._claims.has(name)) return false;
        this._claims.delete(name);
        this._hash = null;
        return true;
    }

    /** Snapshot of the claims, in insertion order. */
    getClaims(): JsonObject {
        return Object.fromEntries(this._claims);
    }

    /**
     * Iterate `[name, value]` pairs in insertion order.
     * Each call starts a new pass over a snapshot of the claims.
     */
    claims(): IterableIterator<[string, JsonValue]> {
        return [...this._claims.entries()][Symbol.iterator]();
    }

    [Symbol.iterator](): IterableIterator<[string, JsonValue]> {
        return this.claims();
    }

    // ── Wire Form ────────────────────────────────────────

    /** The cached wire string, or `null` if there is none. */
    get hash(): string | null {
        return this._hash;
    }

    toString(): string {
        return this._hash ?? '';
    }

    /**
     * Serialize and sign the token.
     *
     * The result is cached as {@link Jwt.hash}. On failure the cache is
     * left as it was.
     *
     * @throws {JwtError} `SERIALIZATION_FAILURE`, `UNSUPPORTED_ALGORITHM` or `SIGNING_FAILURE`
     */
    encode(key: JwtKey): string {
        const start = this._startTimer();
        let hash: string;
        try {
            const header = base64UrlEncode(jsonEncode(this._header));
            const claims = base64UrlEncode(jsonEncode(this._claims));
            const data = `${header}.${claims}`;
            const signature = this._options.registry.sign(this._algorithm, key, data);
            hash = `${data}.${base64UrlEncode(signature)}`;
        } catch (err) {
            this._emit('encode', start, err);
            throw err;
        }
        this._hash = hash;
        this._emit('encode', start);
        return hash;
    }

    // ── Verification ─────────────────────────────────────

    /**
     * Verify the signature over the cached hash, then the registered claims.
     *
     * @param key - A single key, or a key set addressed by the `kid` header
     * @param audience - The audience this verifier represents; required when the token has `aud`
     * @returns `true`; every failure throws
     * @throws {JwtError} `INVALID_TOKEN`, `UNSUPPORTED_ALGORITHM`, `INVALID_SIGNATURE`,
     *     `INVALID_AUDIENCE`, `EXPIRED` or `NOT_YET_VALID`
     */
    verify(key: JwtKeyInput, audience?: string): true {
        const start = this._startTimer();
        let kid: string | number | undefined;
        try {
            const resolved = resolveKey(key, this._header.get('kid'));
            kid = resolved.kid;

            this._verifySignature(resolved.key, resolved.kid);

            validateRegisteredClaims(this._claims, {
                audience,
                now: this._options.clock(),
                leeway: this._options.leeway,
            });
        } catch (err) {
            this._emit('verify', start, err, kid);
            throw err;
        }
        this._emit('verify', start, undefined, kid);
        return true;
    }

    /** {@link Jwt.verify} without throwing. */
    tryVerify(key: JwtKeyInput, audience?: string): Result<true> {
        return attempt(() => this.verify(key, audience));
    }

    // ── Internals ────────────────────────────────────────

    /** @internal */
    private _verifySignature(key: unknown, kid: string | number | undefined): void {
        const segments = splitSegments(this._hash ?? '');
        if (!segments) {
            throw new JwtError('INVALID_SIGNATURE', 'Unable to verify the signature due to an invalid JWT hash.');
        }
        const [header, claims, signatureSegment] = segments;

        // An unknown alg outranks a missing key
        this._options.registry.get(this._algorithm);

        if (key === undefined) {
            const detail = kid !== undefined ? ` for kid "${kid}"` : '';
            throw new JwtError('INVALID_SIGNATURE', `Invalid JWT signature: no key${detail}.`);
        }

        let verified: boolean;
        try {
            const signature = base64UrlDecode(signatureSegment);
            verified = this._options.registry.verify(this._algorithm, key, `${header}.${claims}`, signature);
        } catch (err) {
            if (isJwtError(err, 'UNSUPPORTED_ALGORITHM')) throw err;
            throw new JwtError('INVALID_SIGNATURE', 'Invalid JWT signature.', { cause: err });
        }

        if (!verified) {
            throw new JwtError('INVALID_SIGNATURE', 'Invalid JWT signature.');
        }
    }

    /**
     * Populate this token from a wire string.
     * @internal
     */
    private _initialize(hash: string): void {
        const segments = splitSegments(hash);
        if (!segments) {
            throw new JwtError('INVALID_TOKEN', 'Unexpected number of JWT segments.');
        }
        const [headerSegment, claimsSegment, signatureSegment] = segments;

        const headerJson = decodeSegment(headerSegment, 'header', base64UrlDecodeToString);
        const claimsJson = decodeSegment(claimsSegment, 'claims', base64UrlDecodeToString);
        decodeSegment(signatureSegment, 'signature', base64UrlDecode);

        const header = parseSegment(headerJson, 'JWT header');
        if (header.get('typ') !== 'JWT') {
            throw new JwtError('INVALID_TOKEN', 'Invalid JWT type.');
        }
        const claims = parseSegment(claimsJson, 'set of JWT claims');
        if (claims.size === 0) {
            throw new JwtError('INVALID_TOKEN', 'Invalid set of JWT claims.');
        }

        for (const [name, value] of header) this.setHeaderField(name, value);
        for (const [name, value] of claims) this.setClaim(name, value);

        // Keep the original bytes so verification sees exactly what was signed
        this._hash = hash;
    }

    private _startTimer(): number {
        return this._options.debug ? performance.now() : 0;
    }

    /** @internal */
    private _emit(type: JwtDebugEvent['type'], start: number, err?: unknown, kid?: string | number): void {
        const debug = this._options.debug;
        if (!debug) return;

        const base = {
            algorithm: this.algorithm,
            ok: err === undefined,
            error: isJwtError(err) ? err.code : undefined,
            durationMs: performance.now() - start,
            timestamp: Date.now(),
        };
        debug(type === 'verify' ? { type, ...base, kid } : { type, ...base });
    }
}

// ============================================================================
// Segment Helpers
// ============================================================================

function splitSegments(hash: string): [string, string, string] | null {
    const segments = hash.split('.');
    if (segments.length !== 3) return null;
    const [header = '', claims = '', signature = ''] = segments;
    return [header, claims, signature];
}

function decodeSegment<T>(segment: string, label: string, decode: (text: string) => T): T {
    try {
        return decode(segment);
    } catch (err) {
        throw new JwtError('INVALID_TOKEN', `Invalid ${label} encoding.`, { cause: err });
    }
}

function parseSegment(json: string, label: string): Map<string, JsonValue> {
    try {
        return jsonDecode(json);
    } catch (err) {
        throw new JwtError('INVALID_TOKEN', `Invalid ${label}.`, { cause: err });
    }
}
