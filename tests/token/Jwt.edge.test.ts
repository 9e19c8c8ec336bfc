/**
 * Jwt — Edge Cases & Attack Vectors
 *
 * Malformed wire strings, tampering, `alg: none`, and HMAC/RSA
 * algorithm confusion.
 */
import { describe, it, expect } from 'vitest';
import * as crypto from 'node:crypto';
import { Jwt } from '../../src/token/Jwt.js';
import { JwtError, isJwtError } from '../../src/errors/JwtError.js';
import { base64UrlDecode, base64UrlEncode } from '../../src/encoding/Base64Url.js';

const SECRET = 'test-secret';
const NOW = 1_700_000_000;
const clock = (): number => NOW;

function b64(text: string): string {
    return Buffer.from(text).toString('base64url');
}

function failure(fn: () => unknown): JwtError {
    try {
        fn();
    } catch (err) {
        if (err instanceof JwtError) return err;
        throw err;
    }
    throw new Error('Expected a JwtError');
}

function signedToken(claims: Record<string, string | number> = { sub: 'user-1' }): string {
    const jwt = Jwt.create('HS256');
    for (const [name, value] of Object.entries(claims)) jwt.setClaim(name, value);
    return jwt.encode(SECRET);
}

const rsa = crypto.generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

// ============================================================================
// Malformed Tokens
// ============================================================================

describe('Jwt — malformed wire strings', () => {
    it.each([
        ['four segments', 'not.a.jwt.token'],
        ['empty string', ''],
        ['two segments', 'a.b'],
        ['no dots', 'abc'],
    ])('rejects %s', (_label, token) => {
        const error = failure(() => Jwt.decode(token));
        expect(error.code).toBe('INVALID_TOKEN');
        expect(error.message).toBe('Unexpected number of JWT segments.');
    });

    it('rejects a header segment that is not base64url', () => {
        const error = failure(() => Jwt.decode(`${b64('{"alg":"HS256","typ":"JWT"}')}+.${b64('{}')}.sig`));

        expect(error.code).toBe('INVALID_TOKEN');
        expect(error.message).toBe('Invalid header encoding.');
        expect(isJwtError(error.cause, 'INVALID_ENCODING')).toBe(true);
    });

    it('rejects a claims segment that is not base64url', () => {
        const error = failure(() => Jwt.decode(`${b64('{"alg":"HS256","typ":"JWT"}')}.a=b.sig`));
        expect(error.message).toBe('Invalid claims encoding.');
    });

    it('rejects a signature segment that is not base64url', () => {
        const error = failure(() => Jwt.decode(`${b64('{"alg":"HS256","typ":"JWT"}')}.${b64('{}')}.s/g`));
        expect(error.message).toBe('Invalid signature encoding.');
    });

    it('rejects a header that is not JSON', () => {
        const error = failure(() => Jwt.decode(`${b64('alg=HS256')}.${b64('{}')}.sig`));

        expect(error.code).toBe('INVALID_TOKEN');
        expect(error.message).toBe('Invalid JWT header.');
        expect(isJwtError(error.cause, 'SERIALIZATION_FAILURE')).toBe(true);
    });

    it('rejects a header that is a JSON array', () => {
        const error = failure(() => Jwt.decode(`${b64('["HS256","JWT"]')}.${b64('{}')}.sig`));
        expect(error.message).toBe('Invalid JWT header.');
    });

    it.each([
        ['missing', '{"alg":"HS256"}'],
        ['lowercase', '{"alg":"HS256","typ":"jwt"}'],
        ['another media type', '{"alg":"HS256","typ":"JWE"}'],
    ])('rejects a typ that is %s', (_label, header) => {
        const error = failure(() => Jwt.decode(`${b64(header)}.${b64('{}')}.sig`));
        expect(error.code).toBe('INVALID_TOKEN');
        expect(error.message).toBe('Invalid JWT type.');
    });

    it('rejects claims that are not a JSON object', () => {
        const error = failure(() => Jwt.decode(`${b64('{"alg":"HS256","typ":"JWT"}')}.${b64('"admin"')}.sig`));
        expect(error.message).toBe('Invalid set of JWT claims.');
    });

    it('decodes a token without alg and fails only at verification', () => {
        const decoded = Jwt.decode(`${b64('{"typ":"JWT"}')}.${b64('{"sub":"u"}')}.sig`);

        expect(decoded.algorithm).toBeUndefined();
        expect(failure(() => decoded.verify(SECRET)).code).toBe('UNSUPPORTED_ALGORITHM');
    });

    it('fails verification with an empty signature segment', () => {
        const [header = '', claims = ''] = signedToken().split('.');
        const decoded = Jwt.decode(`${header}.${claims}.`);

        expect(failure(() => decoded.verify(SECRET)).code).toBe('INVALID_SIGNATURE');
    });
});

// ============================================================================
// Tampering
// ============================================================================

describe('Jwt — tampering', () => {
    it('detects a single flipped signature bit', () => {
        const [header = '', claims = '', signature = ''] = signedToken().split('.');
        const bytes = base64UrlDecode(signature);
        bytes[0] = (bytes[0] ?? 0) ^ 0x01;
        const tampered = `${header}.${claims}.${base64UrlEncode(bytes)}`;

        const error = failure(() => Jwt.decode(tampered, { clock }).verify(SECRET));
        expect(error.code).toBe('INVALID_SIGNATURE');
        expect(error.message).toBe('Invalid JWT signature.');
    });

    it('detects a swapped payload', () => {
        const [header = '', , signature = ''] = signedToken({ sub: 'user-1' }).split('.');
        const tampered = `${header}.${b64('{"sub":"admin"}')}.${signature}`;

        const decoded = Jwt.decode(tampered, { clock });
        expect(decoded.getClaim('sub')).toBe('admin');
        expect(failure(() => decoded.verify(SECRET)).code).toBe('INVALID_SIGNATURE');
    });

    it('detects a downgraded header', () => {
        const [, claims = '', signature = ''] = signedToken().split('.');
        const tampered = `${b64('{"alg":"HS384","typ":"JWT"}')}.${claims}.${signature}`;

        expect(failure(() => Jwt.decode(tampered).verify(SECRET)).code).toBe('INVALID_SIGNATURE');
    });

    it('detects a dropped exp claim', () => {
        const token = signedToken({ sub: 'user-1', exp: NOW - 10 });
        const [header = '', , signature = ''] = token.split('.');
        const tampered = `${header}.${b64('{"sub":"user-1"}')}.${signature}`;

        expect(failure(() => Jwt.decode(tampered, { clock }).verify(SECRET)).code).toBe('INVALID_SIGNATURE');
    });
});

// ============================================================================
// Algorithm Attacks
// ============================================================================

describe('Jwt — algorithm attacks', () => {
    it('rejects alg "none" with an empty signature', () => {
        const token = `${b64('{"alg":"none","typ":"JWT"}')}.${b64('{"sub":"admin"}')}.`;
        const error = failure(() => Jwt.decode(token).verify(SECRET));

        expect(error.code).toBe('UNSUPPORTED_ALGORITHM');
        expect(error.message).toBe('Unsupported algorithm: "none"');
    });

    it('rejects an HS256 token forged with the RSA public key as the HMAC secret', () => {
        const header = b64('{"alg":"HS256","typ":"JWT"}');
        const claims = b64('{"sub":"admin"}');
        const forged = crypto.createHmac('sha256', rsa.publicKey).update(`${header}.${claims}`).digest('base64url');
        const decoded = Jwt.decode(`${header}.${claims}.${forged}`);

        const error = failure(() => decoded.verify(crypto.createPublicKey(rsa.publicKey)));

        expect(error.code).toBe('INVALID_SIGNATURE');
        expect(isJwtError(error.cause, 'VERIFICATION_FAILURE')).toBe(true);
    });

    it('rejects an HS256 token forged with the RSA public key PEM as both secret and verification key', () => {
        const header = b64('{"alg":"HS256","typ":"JWT"}');
        const claims = b64('{"sub":"admin"}');
        const forged = crypto.createHmac('sha256', rsa.publicKey).update(`${header}.${claims}`).digest('base64url');
        const decoded = Jwt.decode(`${header}.${claims}.${forged}`);

        const fromString = failure(() => decoded.verify(rsa.publicKey));
        expect(fromString.code).toBe('INVALID_SIGNATURE');
        expect(isJwtError(fromString.cause, 'VERIFICATION_FAILURE')).toBe(true);

        const fromBytes = failure(() => decoded.verify(Buffer.from(rsa.publicKey)));
        expect(isJwtError(fromBytes.cause, 'VERIFICATION_FAILURE')).toBe(true);
    });

    it('rejects the same forgery when the PEM comes from a key set', () => {
        const header = b64('{"alg":"HS256","typ":"JWT","kid":"k1"}');
        const claims = b64('{"sub":"admin"}');
        const forged = crypto.createHmac('sha256', rsa.publicKey).update(`${header}.${claims}`).digest('base64url');

        const error = failure(() => Jwt.decode(`${header}.${claims}.${forged}`).verify({ k1: rsa.publicKey }));
        expect(error.code).toBe('INVALID_SIGNATURE');
    });

    it('refuses to sign HS256 with PEM key material', () => {
        const jwt = Jwt.create('HS256');
        jwt.setClaim('sub', 'user-1');

        const error = failure(() => jwt.encode(rsa.privateKey));
        expect(error.code).toBe('SIGNING_FAILURE');
        expect(error.message).toBe('Unable to sign with HS256: HS256 requires a symmetric secret, received PEM key material');
    });

    it('rejects an RS256 token when given only a shared secret', () => {
        const jwt = Jwt.create('RS256');
        jwt.setClaim('sub', 'user-1');
        const decoded = Jwt.decode(jwt.encode(rsa.privateKey));

        const error = failure(() => decoded.verify(SECRET));
        expect(error.code).toBe('INVALID_SIGNATURE');
        expect(isJwtError(error.cause, 'VERIFICATION_FAILURE')).toBe(true);
    });

    it('rejects an alg that is not a string', () => {
        const token = `${b64('{"alg":256,"typ":"JWT"}')}.${b64('{"sub":"u"}')}.sig`;
        const error = failure(() => Jwt.decode(token).verify(SECRET));

        expect(error.code).toBe('UNSUPPORTED_ALGORITHM');
        expect(error.message).toBe('Unsupported algorithm: "256"');
    });
});
