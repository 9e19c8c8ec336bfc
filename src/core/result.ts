/**
 * Result\<T\> — Railway-Oriented Results for JWT Operations
 *
 * A discriminated union for callers that prefer branching over
 * `try/catch`. The throwing entry points (`Jwt.decode`, `jwt.verify`)
 * have `try*` counterparts that return a `Result`.
 *
 * @example
 * ```typescript
 * const decoded = Jwt.tryDecode(header.slice(7));
 * if (!decoded.ok) return reject(decoded.error.code);
 * const jwt = decoded.value;
 * ```
 *
 * @module
 */
import { JwtError } from '../errors/JwtError.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed result carrying the {@link JwtError} that stopped the pipeline. */
export interface Failure {
    readonly ok: false;
    readonly error: JwtError;
}

/** Either `Success<T>` or `Failure`; check `result.ok` to narrow. */
export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(error: JwtError): Failure {
    return { ok: false, error };
}

/**
 * Run a throwing JWT operation and capture its outcome.
 *
 * `JwtError`s become a `Failure`. Anything else is a programming
 * error and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
    try {
        return succeed(fn());
    } catch (err) {
        if (err instanceof JwtError) return fail(err);
        throw err;
    }
}
