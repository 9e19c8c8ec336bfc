import { describe, it, expect } from 'vitest';
import { succeed, fail, attempt } from '../../src/core/result.js';
import { JwtError } from '../../src/errors/JwtError.js';

describe('Result', () => {
    it('succeed() wraps a value', () => {
        expect(succeed(42)).toEqual({ ok: true, value: 42 });
    });

    it('fail() wraps a JwtError', () => {
        const error = new JwtError('EXPIRED', 'The JWT has expired.');
        expect(fail(error)).toEqual({ ok: false, error });
    });

    it('attempt() captures the return value', () => {
        expect(attempt(() => 'token')).toEqual({ ok: true, value: 'token' });
    });

    it('attempt() turns a JwtError into a Failure', () => {
        const error = new JwtError('INVALID_TOKEN', 'Unexpected number of JWT segments.');
        const result = attempt(() => { throw error; });

        expect(result.ok).toBe(false);
        expect(!result.ok && result.error).toBe(error);
    });

    it('attempt() rethrows anything that is not a JwtError', () => {
        expect(() => attempt(() => { throw new TypeError('bug'); })).toThrow(TypeError);
    });
});
