import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, engineConfigFromEnv, resolveEngineConfig } from '../config.js';
import { InvalidParamsError } from '../errors.js';

describe('resolveEngineConfig', () => {
    it('returns defaults without overrides', () => {
        expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('applies overrides', () => {
        expect(resolveEngineConfig({ maxProofLength: 8, logLevel: 'silent' })).toEqual({
            deadlineBufferMs: 60_000,
            maxProofLength: 8,
            logLevel: 'silent',
        });
    });

    it('rejects bad numbers', () => {
        expect(() => resolveEngineConfig({ deadlineBufferMs: 0 })).toThrow(InvalidParamsError);
        expect(() => resolveEngineConfig({ deadlineBufferMs: 1.5 })).toThrow(InvalidParamsError);
        expect(() => resolveEngineConfig({ maxProofLength: -1 })).toThrow(InvalidParamsError);
    });
});

describe('engineConfigFromEnv', () => {
    it('skips unset and empty variables', () => {
        expect(engineConfigFromEnv({ MIGRATION_LOG_LEVEL: '' })).toEqual({});
    });

    it('parses every variable', () => {
        expect(engineConfigFromEnv({
            MIGRATION_DEADLINE_BUFFER_MS: '30000',
            MIGRATION_MAX_PROOF_LENGTH: ' 16 ',
            MIGRATION_LOG_LEVEL: 'debug',
        })).toEqual({
            deadlineBufferMs: 30_000,
            maxProofLength: 16,
            logLevel: 'debug',
        });
    });

    it('rejects malformed values', () => {
        expect(() => engineConfigFromEnv({ MIGRATION_DEADLINE_BUFFER_MS: '30s' })).toThrow(InvalidParamsError);
        expect(() => engineConfigFromEnv({ MIGRATION_LOG_LEVEL: 'verbose' })).toThrow(InvalidParamsError);
    });
});
