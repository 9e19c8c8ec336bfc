/**
 * ClaimValidator — Registered Claim Constraints
 *
 * Checks `aud`, `exp`, `iat` and `nbf` in that order and stops at the
 * first violation. A claim that is absent or `null` is not checked.
 *
 * Time claims are NumericDate values: JSON numbers, or strings holding
 * a decimal number (`"1700000000"`).
 *
 * @module
 */
import { JwtError } from '../errors/JwtError.js';
import type { JsonValue } from '../encoding/JsonCodec.js';

const NUMERIC_STRING = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

export interface ClaimCheckContext {
    /** The audience the caller identifies as */
    readonly audience?: string | undefined;
    /** Current time, epoch seconds */
    readonly now: number;
    /** Clock-skew tolerance, seconds */
    readonly leeway: number;
}

/**
 * @throws {JwtError} `INVALID_TOKEN`, `INVALID_AUDIENCE`, `EXPIRED` or `NOT_YET_VALID`
 */
export function validateRegisteredClaims(
    claims: ReadonlyMap<string, JsonValue>,
    context: ClaimCheckContext,
): void {
    const { audience, now, leeway } = context;

    const aud = claims.get('aud');
    if (aud !== undefined && aud !== null) {
        const accepted = toAudienceList(aud);
        if (audience === undefined || !accepted.includes(audience)) {
            throw new JwtError('INVALID_AUDIENCE', 'Invalid JWT audience.');
        }
    }

    const exp = readNumericDate(claims, 'exp');
    if (exp !== undefined && now - leeway >= exp) {
        throw new JwtError('EXPIRED', 'The JWT has expired.');
    }

    const iat = readNumericDate(claims, 'iat');
    if (iat !== undefined && now + leeway < iat) {
        throw new JwtError('NOT_YET_VALID', 'The JWT is not yet valid.');
    }

    const nbf = readNumericDate(claims, 'nbf');
    if (nbf !== undefined && now + leeway < nbf) {
        throw new JwtError('NOT_YET_VALID', 'The JWT is not yet valid.');
    }
}

/**
 * `aud` is a single string or a dense array of strings.
 * @throws {JwtError} `INVALID_TOKEN` for any other shape
 */
export function toAudienceList(aud: JsonValue): readonly string[] {
    if (typeof aud === 'string') return [aud];

    if (Array.isArray(aud)) {
        const audiences: string[] = [];
        for (let index = 0; index < aud.length; index++) {
            const entry: unknown = aud[index];
            if (!(index in aud) || typeof entry !== 'string') {
                throw new JwtError('INVALID_TOKEN', 'Invalid "aud" value.');
            }
            audiences.push(entry);
        }
        return audiences;
    }

    throw new JwtError('INVALID_TOKEN', 'Invalid "aud" value.');
}

/**
 * Read a NumericDate claim.
 *
 * @returns The value in seconds, or `undefined` when the claim is absent or null
 * @throws {JwtError} `INVALID_TOKEN` when present but not numeric
 */
export function readNumericDate(claims: ReadonlyMap<string, JsonValue>, name: string): number | undefined {
    const value = claims.get(name);
    if (value === undefined || value === null) return undefined;

    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && NUMERIC_STRING.test(value)) return Number(value);

    throw new JwtError('INVALID_TOKEN', `Invalid "${name}" value.`);
}
