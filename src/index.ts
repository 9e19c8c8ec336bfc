/**
 * @module
 * @description
 * JSON Web Token construction, signing, parsing and verification.
 */
// ── Token ────────────────────────────────────────────────
/** @category Token */
export { Jwt } from './token/Jwt.js';
/** @category Token */
export { resolveKey, isKeySet, type ResolvedKey } from './token/KeyResolver.js';
/** @category Token */
export {
    validateRegisteredClaims, toAudienceList, readNumericDate,
    type ClaimCheckContext,
} from './token/ClaimValidator.js';

// ── Verifier ─────────────────────────────────────────────
/** @category Verifier */
export { JwtVerifier } from './verifier/JwtVerifier.js';
/** @category Verifier */
export type { JwtVerifierConfig, JwtPayload, JwtVerifyResult } from './verifier/JwtVerifier.js';

// ── Algorithms ───────────────────────────────────────────
/** @category Algorithms */
export { AlgorithmRegistry, defaultAlgorithmRegistry } from './algorithms/AlgorithmRegistry.js';
/** @category Algorithms */
export { createHmacAlgorithm, HS256, HS384, HS512, type HmacHash } from './algorithms/HmacAlgorithm.js';
/** @category Algorithms */
export { createRsaAlgorithm, RS256, RS384, RS512, type RsaHash } from './algorithms/RsaAlgorithm.js';
/** @category Algorithms */
export {
    JwtAlgorithm, isJwtKey,
    type Algorithm, type JwtAlgorithmName, type JwtKey, type JwtKeySet, type JwtKeyInput,
} from './algorithms/types.js';

// ── Encoding ─────────────────────────────────────────────
/** @category Encoding */
export { base64UrlEncode, base64UrlDecode, base64UrlDecodeToString } from './encoding/Base64Url.js';
/** @category Encoding */
export { jsonEncode, jsonDecode, type JsonValue, type JsonObject } from './encoding/JsonCodec.js';

// ── Errors & Results ─────────────────────────────────────
/** @category Errors */
export { JwtError, isJwtError, type JwtErrorCode } from './errors/JwtError.js';
/** @category Errors */
export { succeed, fail, attempt, type Result, type Success, type Failure } from './core/result.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export {
    resolveJwtOptions, loadJwtConfigFromEnv, systemClock, JwtConfigError,
    type JwtOptions, type ResolvedJwtOptions, type EnvJwtConfig, type Clock,
} from './config/JwtConfig.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createJwtDebugObserver,
    type JwtDebugEvent, type JwtDebugObserverFn,
    type EncodeEvent, type DecodeEvent, type VerifyEvent,
} from './observability/DebugObserver.js';
