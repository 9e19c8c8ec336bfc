/**
 * JwtConfig Tests
 *
 * Covers:
 * - Option defaults and validation
 * - JwtConfigError message format
 * - Environment variable loading
 */
import { describe, it, expect } from 'vitest';
import {
    resolveJwtOptions,
    loadJwtConfigFromEnv,
    systemClock,
    JwtConfigError,
    type JwtOptions,
} from '../../src/config/JwtConfig.js';
import { AlgorithmRegistry, defaultAlgorithmRegistry } from '../../src/algorithms/AlgorithmRegistry.js';
import { HS256 } from '../../src/algorithms/HmacAlgorithm.js';
import { Jwt } from '../../src/token/Jwt.js';

function configError(fn: () => unknown): JwtConfigError {
    try {
        fn();
    } catch (err) {
        if (err instanceof JwtConfigError) return err;
        throw err;
    }
    throw new Error('Expected a JwtConfigError');
}

// ============================================================================
// Options
// ============================================================================

describe('resolveJwtOptions', () => {
    it('fills in defaults', () => {
        const options = resolveJwtOptions();

        expect(options.leeway).toBe(0);
        expect(options.clock).toBe(systemClock);
        expect(options.registry).toBe(defaultAlgorithmRegistry);
        expect(options.debug).toBeUndefined();
    });

    it('keeps supplied values', () => {
        const clock = (): number => 42;
        const registry = new AlgorithmRegistry([HS256]);
        const debug = (): void => {};

        const options = resolveJwtOptions({ leeway: 30, clock, registry, debug });

        expect(options).toEqual({ leeway: 30, clock, registry, debug });
        expect(options.registry).toBe(registry);
    });

    it('treats explicit undefined as unset', () => {
        expect(resolveJwtOptions({ leeway: undefined, clock: undefined }).leeway).toBe(0);
    });

    it('reports the system clock in whole seconds', () => {
        const now = systemClock();
        expect(Number.isInteger(now)).toBe(true);
        expect(Math.abs(now - Date.now() / 1000)).toBeLessThan(2);
    });

    it('rejects a negative leeway', () => {
        const error = configError(() => resolveJwtOptions({ leeway: -1 }));

        expect(error.source).toBe('JwtOptions');
        expect(error.message.startsWith("[jwt] Invalid JwtOptions:\n  • 'leeway': ")).toBe(true);
    });

    it('rejects a non-finite leeway', () => {
        expect(configError(() => resolveJwtOptions({ leeway: Infinity })).source).toBe('JwtOptions');
    });

    it('rejects a registry that is not an AlgorithmRegistry', () => {
        const options: JwtOptions = { registry: Object.create(null) };
        const error = configError(() => resolveJwtOptions(options));

        expect(error.message).toContain("'registry'");
    });

    it('validates options passed to Jwt', () => {
        expect(() => Jwt.create('HS256', { leeway: -5 })).toThrow(JwtConfigError);
    });

    it('lists every invalid field', () => {
        const options: JwtOptions = { leeway: -1, registry: Object.create(null) };
        const error = configError(() => resolveJwtOptions(options));

        expect(error.message.split('\n')).toHaveLength(3);
    });
});

// ============================================================================
// Environment
// ============================================================================

describe('loadJwtConfigFromEnv', () => {
    it('reads leeway, audience and algorithms', () => {
        const config = loadJwtConfigFromEnv({
            JWT_LEEWAY: '30',
            JWT_AUDIENCE: 'api',
            JWT_ALGORITHMS: 'HS256, RS256,',
        });

        expect(config).toEqual({ leeway: 30, audience: 'api', algorithms: ['HS256', 'RS256'] });
    });

    it('returns an empty config when nothing is set', () => {
        expect(loadJwtConfigFromEnv({})).toEqual({});
    });

    it('treats blank variables as unset', () => {
        expect(loadJwtConfigFromEnv({ JWT_LEEWAY: '  ', JWT_AUDIENCE: '' })).toEqual({});
    });

    it('trims surrounding whitespace', () => {
        expect(loadJwtConfigFromEnv({ JWT_AUDIENCE: ' api ', JWT_LEEWAY: ' 5 ' })).toEqual({ audience: 'api', leeway: 5 });
    });

    it('ignores unrelated variables', () => {
        expect(loadJwtConfigFromEnv({ HOME: '/root', JWT_SECRET: 'test-secret' })).toEqual({});
    });

    it.each(['soon', '-5', '1.5'])('rejects JWT_LEEWAY=%s', (value) => {
        const error = configError(() => loadJwtConfigFromEnv({ JWT_LEEWAY: value }));

        expect(error.source).toBe('environment');
        expect(error.message.startsWith("[jwt] Invalid environment:\n  • 'JWT_LEEWAY': ")).toBe(true);
    });

    it('feeds straight into Jwt options', () => {
        const { leeway } = loadJwtConfigFromEnv({ JWT_LEEWAY: '10' });
        const jwt = Jwt.create('HS256', { leeway, clock: () => 1_000 });
        jwt.setClaim('exp', 995);
        jwt.encode('test-secret');

        expect(jwt.verify('test-secret')).toBe(true);
    });
});
