/**
 * RSA Algorithms — RS256 / RS384 / RS512 (RSASSA-PKCS1-v1_5)
 *
 * Signing takes a private key. Verification takes a public key, a
 * certificate, or a private key (its public half is derived).
 *
 * @module
 */
import {
    sign as cryptoSign,
    verify as cryptoVerify,
    createPrivateKey,
    createPublicKey,
    KeyObject,
} from 'node:crypto';
import type { Algorithm, JwtKey } from './types.js';

export type RsaHash = 'sha256' | 'sha384' | 'sha512';

export function createRsaAlgorithm(name: string, hash: RsaHash): Algorithm {
    return Object.freeze({
        name,
        sign(key: JwtKey, data: string): Uint8Array {
            return cryptoSign(hash, Buffer.from(data, 'utf8'), toPrivateKey(key, name));
        },
        verify(key: JwtKey, data: string, signature: Uint8Array): boolean {
            return cryptoVerify(hash, Buffer.from(data, 'utf8'), toPublicKey(key, name), signature);
        },
    });
}

// ── Key Normalization ────────────────────────────────────

function toPrivateKey(key: JwtKey, name: string): KeyObject {
    let keyObject: KeyObject;
    if (key instanceof KeyObject) {
        if (key.type !== 'private') {
            throw new Error(`${name} signing requires a private key, received a ${key.type} key`);
        }
        keyObject = key;
    } else {
        keyObject = createPrivateKey(typeof key === 'string' ? key : Buffer.from(key));
    }
    return assertRsa(keyObject, name);
}

function toPublicKey(key: JwtKey, name: string): KeyObject {
    let keyObject: KeyObject;
    if (key instanceof KeyObject) {
        if (key.type === 'secret') {
            throw new Error(`${name} verification requires an RSA public or private key, received a secret key`);
        }
        keyObject = key.type === 'private' ? createPublicKey(key) : key;
    } else {
        keyObject = createPublicKey(typeof key === 'string' ? key : Buffer.from(key));
    }
    return assertRsa(keyObject, name);
}

function assertRsa(key: KeyObject, name: string): KeyObject {
    if (key.asymmetricKeyType !== 'rsa') {
        throw new Error(`${name} requires an RSA key, received ${key.asymmetricKeyType ?? 'an unknown key type'}`);
    }
    return key;
}

export const RS256 = createRsaAlgorithm('RS256', 'sha256');
export const RS384 = createRsaAlgorithm('RS384', 'sha384');
export const RS512 = createRsaAlgorithm('RS512', 'sha512');
