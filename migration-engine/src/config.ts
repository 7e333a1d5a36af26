/**
 * Coin Migration Engine — Configuration
 *
 * Defaults, caller overrides, and the `MIGRATION_*` environment
 * variables, merged in that order of precedence (lowest first).
 */

import { InvalidParamsError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface MigrationEngineConfig {
    /** Added to the call's clock reading to form AMM deadlines (ms) */
    deadlineBufferMs: number;

    /** Longest snapshot proof accepted by `migrate` */
    maxProofLength: number;

    /** Minimum level written by the console logger */
    logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: MigrationEngineConfig = {
    deadlineBufferMs: 60_000,
    maxProofLength: 64,
    logLevel: 'info',
};

export function resolveEngineConfig(overrides?: Partial<MigrationEngineConfig>): MigrationEngineConfig {
    const config = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

    if (!Number.isSafeInteger(config.deadlineBufferMs) || config.deadlineBufferMs <= 0) {
        throw new InvalidParamsError(`deadlineBufferMs must be a positive integer, got ${config.deadlineBufferMs}`);
    }
    if (!Number.isSafeInteger(config.maxProofLength) || config.maxProofLength < 0) {
        throw new InvalidParamsError(`maxProofLength must be a non-negative integer, got ${config.maxProofLength}`);
    }
    return config;
}

function parseIntVar(name: string, raw: string): number {
    if (!/^\d+$/.test(raw.trim())) {
        throw new InvalidParamsError(`${name} must be an integer, got "${raw}"`);
    }
    return Number(raw.trim());
}

/** Read overrides from environment variables; unset variables are skipped. */
export function engineConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
): Partial<MigrationEngineConfig> {
    const config: Partial<MigrationEngineConfig> = {};

    const deadline = env.MIGRATION_DEADLINE_BUFFER_MS;
    if (deadline !== undefined && deadline !== '') {
        config.deadlineBufferMs = parseIntVar('MIGRATION_DEADLINE_BUFFER_MS', deadline);
    }

    const maxProof = env.MIGRATION_MAX_PROOF_LENGTH;
    if (maxProof !== undefined && maxProof !== '') {
        config.maxProofLength = parseIntVar('MIGRATION_MAX_PROOF_LENGTH', maxProof);
    }

    const level = env.MIGRATION_LOG_LEVEL;
    if (level !== undefined && level !== '') {
        if (!isLogLevel(level)) {
            throw new InvalidParamsError(`MIGRATION_LOG_LEVEL must be one of debug|info|warn|error|silent, got "${level}"`);
        }
        config.logLevel = level;
    }

    return config;
}
