/**
 * JwtConfig — Options for Token Operations
 *
 * `JwtOptions` is what callers pass to `Jwt.create()`, `Jwt.decode()` and
 * `JwtVerifier`. It is validated once with zod and merged with defaults:
 *
 * | Option     | Default                         |
 * |------------|---------------------------------|
 * | `leeway`   | `0` seconds                     |
 * | `clock`    | `Math.floor(Date.now() / 1000)` |
 * | `registry` | `defaultAlgorithmRegistry`      |
 * | `debug`    | none                            |
 *
 * `loadJwtConfigFromEnv()` reads the verification settings that are
 * usually deployment-specific (`JWT_LEEWAY`, `JWT_AUDIENCE`,
 * `JWT_ALGORITHMS`).
 *
 * @module
 */
import { z, type ZodError } from 'zod';
import { AlgorithmRegistry, defaultAlgorithmRegistry } from '../algorithms/AlgorithmRegistry.js';
import type { JwtDebugObserverFn } from '../observability/DebugObserver.js';

// ============================================================================
// Types
// ============================================================================

/** Returns the current time in epoch seconds. */
export type Clock = () => number;

export interface JwtOptions {
    /** Clock-skew tolerance in seconds for `exp`/`iat`/`nbf`. Default: 0 */
    readonly leeway?: number | undefined;
    /** Time source. Default: the system clock */
    readonly clock?: Clock | undefined;
    /** Algorithm table used to sign and verify. Default: HS*, RS* */
    readonly registry?: AlgorithmRegistry | undefined;
    /** Receives encode/decode/verify events. */
    readonly debug?: JwtDebugObserverFn | undefined;
}

export interface ResolvedJwtOptions {
    readonly leeway: number;
    readonly clock: Clock;
    readonly registry: AlgorithmRegistry;
    readonly debug: JwtDebugObserverFn | undefined;
}

/** Verification settings read from the environment. */
export interface EnvJwtConfig {
    readonly leeway?: number;
    readonly audience?: string;
    readonly algorithms?: readonly string[];
}

// ============================================================================
// Schemas
// ============================================================================

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

const JwtOptionsSchema = z.object({
    leeway: z.number().finite().nonnegative().default(0),
    clock: z.custom<Clock>((value) => typeof value === 'function', 'Expected a function').default(() => systemClock),
    registry: z.instanceof(AlgorithmRegistry).default(() => defaultAlgorithmRegistry),
    debug: z.custom<JwtDebugObserverFn>((value) => typeof value === 'function', 'Expected a function').optional(),
});

const EnvSchema = z.object({
    JWT_LEEWAY: z.coerce.number().int().nonnegative().optional(),
    JWT_AUDIENCE: z.string().optional(),
    JWT_ALGORITHMS: z.string()
        .transform((list) => list.split(',').map((name) => name.trim()).filter((name) => name.length > 0))
        .optional(),
});

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validate options and fill in defaults.
 *
 * @throws {JwtConfigError} On an invalid value (e.g. a negative leeway)
 */
export function resolveJwtOptions(options: JwtOptions = {}): ResolvedJwtOptions {
    const result = JwtOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new JwtConfigError('JwtOptions', result.error);
    }
    return {
        leeway: result.data.leeway,
        clock: result.data.clock,
        registry: result.data.registry,
        debug: result.data.debug,
    };
}

/**
 * Read verification settings from environment variables.
 * Empty variables are treated as unset.
 *
 * @param env - Variables to read. Default: `process.env`
 * @throws {JwtConfigError} On a malformed value (e.g. `JWT_LEEWAY=soon`)
 */
export function loadJwtConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvJwtConfig {
    const present: Record<string, string> = {};
    for (const name of ['JWT_LEEWAY', 'JWT_AUDIENCE', 'JWT_ALGORITHMS']) {
        const value = env[name];
        if (value !== undefined && value.trim() !== '') present[name] = value.trim();
    }

    const result = EnvSchema.safeParse(present);
    if (!result.success) {
        throw new JwtConfigError('environment', result.error);
    }

    const { JWT_LEEWAY, JWT_AUDIENCE, JWT_ALGORITHMS } = result.data;
    return {
        ...(JWT_LEEWAY !== undefined ? { leeway: JWT_LEEWAY } : {}),
        ...(JWT_AUDIENCE !== undefined ? { audience: JWT_AUDIENCE } : {}),
        ...(JWT_ALGORITHMS !== undefined ? { algorithms: JWT_ALGORITHMS } : {}),
    };
}

// ============================================================================
// Config Error
// ============================================================================

/**
 * Thrown when options or environment variables fail validation.
 *
 * `message` lists every offending field; `cause` is the `ZodError`.
 */
export class JwtConfigError extends Error {
    /** Where the invalid values came from (`'JwtOptions'`, `'environment'`). */
    readonly source: string;

    constructor(source: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[jwt] Invalid ${source}:\n${fieldErrors}`, { cause: zodError });
        this.name = 'JwtConfigError';
        this.source = source;
    }
}
