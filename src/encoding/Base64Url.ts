/**
 * Base64Url — URL-Safe, Unpadded Base64 (RFC 4648 §5)
 *
 * Every JWT segment goes through this codec. Encoding is total; decoding
 * rejects anything outside the `[A-Za-z0-9_-]` alphabet and lengths for
 * which no padding can be restored.
 *
 * @module
 */
import { JwtError } from '../errors/JwtError.js';

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes (or a UTF-8 string) as unpadded base64url.
 */
export function base64UrlEncode(data: Uint8Array | string): string {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    return bytes.toString('base64url');
}

/**
 * Decode unpadded base64url text.
 *
 * @throws {JwtError} `INVALID_ENCODING` on a foreign character or impossible length
 */
export function base64UrlDecode(text: string): Uint8Array {
    if (!BASE64URL_ALPHABET.test(text)) {
        throw new JwtError('INVALID_ENCODING', 'Input contains characters outside the base64url alphabet');
    }
    // A single leftover character carries only 6 bits and cannot form a byte
    if (text.length % 4 === 1) {
        throw new JwtError('INVALID_ENCODING', `Invalid base64url length: ${text.length}`);
    }
    return new Uint8Array(Buffer.from(text, 'base64url'));
}

/** Decode base64url text into a UTF-8 string. */
export function base64UrlDecodeToString(text: string): string {
    return Buffer.from(base64UrlDecode(text)).toString('utf8');
}
