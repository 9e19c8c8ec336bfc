/**
 * DebugObserver — Opt-In Observability for Token Operations
 *
 * Typed debug events emitted by `encode`, `decode` and `verify`.
 * When no observer is configured (the default) nothing is measured or
 * emitted.
 *
 * Events never carry keys, signatures or the token itself: only the
 * algorithm, the `kid`, the outcome and the timing.
 *
 * @example
 * ```typescript
 * import { Jwt, createJwtDebugObserver } from 'compact-jwt';
 *
 * // Default: pretty console.debug output
 * const debug = createJwtDebugObserver();
 *
 * // Custom handler (e.g. send to telemetry)
 * const debug = createJwtDebugObserver((event) => {
 *     telemetry.track(`jwt.${event.type}`, event);
 * });
 *
 * const jwt = Jwt.decode(token, { debug });
 * ```
 *
 * @module
 */
import type { JwtErrorCode } from '../errors/JwtError.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

interface BaseEvent {
    /** The `alg` header value, when it is a string */
    readonly algorithm?: string | undefined;
    readonly ok: boolean;
    /** Error code when `ok` is false */
    readonly error?: JwtErrorCode | undefined;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after `jwt.encode()` succeeds or fails. */
export interface EncodeEvent extends BaseEvent {
    readonly type: 'encode';
}

/** Emitted after `Jwt.decode()` succeeds or fails. */
export interface DecodeEvent extends BaseEvent {
    readonly type: 'decode';
}

/**
 * Emitted after `jwt.verify()`.
 * `kid` is present when the header selected a key from a key set.
 */
export interface VerifyEvent extends BaseEvent {
    readonly type: 'verify';
    readonly kid?: string | number | undefined;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: JwtDebugEvent) {
 *     switch (event.type) {
 *         case 'encode': // EncodeEvent
 *         case 'decode': // DecodeEvent
 *         case 'verify': // VerifyEvent
 *     }
 * }
 * ```
 */
export type JwtDebugEvent = EncodeEvent | DecodeEvent | VerifyEvent;

/** Observer function that receives debug events. */
export type JwtDebugObserverFn = (event: JwtDebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output:
 *
 * ```
 * [jwt] encode  HS256 ✓ 0.2ms
 * [jwt] verify  RS256 kid=k1 ✗ EXPIRED 0.9ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createJwtDebugObserver(handler?: JwtDebugObserverFn): JwtDebugObserverFn {
    if (handler) return handler;

    return (event: JwtDebugEvent): void => {
        const prefix = '[jwt]';
        const algorithm = event.algorithm ?? '-';
        const kid = event.type === 'verify' && event.kid !== undefined ? ` kid=${event.kid}` : '';
        const status = event.ok ? '✓' : `✗ ${event.error ?? ''}`;
        console.debug(`${prefix} ${event.type.padEnd(7)} ${algorithm}${kid} ${status} ${event.durationMs.toFixed(1)}ms`);
    };
}
