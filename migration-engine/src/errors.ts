/**
 * Coin Migration Engine — Errors
 *
 * Every error aborts the operation that raised it; nothing here is
 * retried or downgraded. Callers resubmit with corrected inputs.
 */

export type MigrationErrorCode =
    | 'AUTHORIZATION'
    | 'STATE'
    | 'QUOTA_EXCEEDED'
    | 'PROOF_INVALID'
    | 'ARITHMETIC'
    | 'ARITHMETIC_OVERFLOW'
    | 'INVALID_SUPPLY'
    | 'INSUFFICIENT_BALANCE'
    | 'INVALID_PARAMS';

export class MigrationError extends Error {
    readonly code: MigrationErrorCode;

    constructor(code: MigrationErrorCode, message: string) {
        super(message);
        this.name = 'MigrationError';
        this.code = code;
    }
}

/** Caller does not hold the instance's admin capability. */
export class AuthorizationError extends MigrationError {
    constructor(message = 'Caller is not the migration admin') {
        super('AUTHORIZATION', message);
        this.name = 'AuthorizationError';
    }
}

export type StateErrorReason =
    | 'AlreadyFinalized'
    | 'NotFinalized'
    | 'AlreadyLocked'
    | 'NotLocked'
    | 'ClaimsNotOpen'
    | 'BalanceConsumed'
    | 'PoolAlreadyExists'
    | 'PoolNotFound'
    | 'UnknownMigration';

/** Operation attempted in the wrong phase. */
export class StateError extends MigrationError {
    readonly reason: StateErrorReason;

    constructor(reason: StateErrorReason, detail?: string) {
        super('STATE', detail ? `${reason}: ${detail}` : reason);
        this.name = 'StateError';
        this.reason = reason;
    }
}

export class QuotaExceededError extends MigrationError {
    readonly participant: string;
    readonly quota: bigint;
    readonly attempted: bigint;

    constructor(participant: string, quota: bigint, attempted: bigint) {
        super('QUOTA_EXCEEDED', `Cumulative deposit ${attempted} exceeds quota ${quota} for ${participant}`);
        this.name = 'QuotaExceededError';
        this.participant = participant;
        this.quota = quota;
        this.attempted = attempted;
    }
}

/** Recomputed snapshot root does not match the committed root. */
export class ProofInvalidError extends MigrationError {
    constructor(message = 'Snapshot proof does not match root') {
        super('PROOF_INVALID', message);
        this.name = 'ProofInvalidError';
    }
}

export class ArithmeticError extends MigrationError {
    constructor(message: string, code: MigrationErrorCode = 'ARITHMETIC') {
        super(code, message);
        this.name = 'ArithmeticError';
    }
}

/** Wide-integer result does not fit the target width. */
export class ArithmeticOverflowError extends ArithmeticError {
    constructor(message: string) {
        super(message, 'ARITHMETIC_OVERFLOW');
        this.name = 'ArithmeticOverflowError';
    }
}

export class InvalidSupplyError extends MigrationError {
    constructor(message = 'Supply must be non-zero') {
        super('INVALID_SUPPLY', message);
        this.name = 'InvalidSupplyError';
    }
}

export class InsufficientBalanceError extends MigrationError {
    constructor(message: string) {
        super('INSUFFICIENT_BALANCE', message);
        this.name = 'InsufficientBalanceError';
    }
}

export class InvalidParamsError extends MigrationError {
    constructor(message: string) {
        super('INVALID_PARAMS', message);
        this.name = 'InvalidParamsError';
    }
}
