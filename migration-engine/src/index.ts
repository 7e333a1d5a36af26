/**
 * Coin Migration Engine
 *
 * @module @coin-migration/engine
 *
 * Architecture:
 *
 *   ┌─────────────────────────────────────────────────────────┐
 *   │                 MigrationController                     │
 *   │  (initialize → lock → migrate* → finalize → claim*)     │
 *   └───────┬──────────────┬───────────────┬─────────────────┘
 *           │              │               │
 *   ┌───────▼──────┐ ┌─────▼──────┐ ┌──────▼────────┐
 *   │ EscrowVault  │ │ Snapshot   │ │  AmmAdapter   │
 *   │ + Ledger     │ │ (merkle    │ │ (orientation, │
 *   │              │ │  proofs)   │ │  deadlines)   │
 *   └──────────────┘ └────────────┘ └──────┬────────┘
 *                                          │
 *        Events / Logger            ┌──────▼──────┐
 *                                   │  ClmmVenue  │
 *   MigrationTxBuilder ──► Sui PTBs └─────────────┘
 */

// Core types
export {
    RATIO_SCALING,
    Q64,
    U64_MAX,
    U128_MAX,
    MIN_SQRT_PRICE,
    MAX_SQRT_PRICE,
    MIN_TICK,
    MAX_TICK,
    FEE_TIER_TICK_SPACING,
    MIGRATION_MODULES,
    MIGRATION_FUNCTIONS,
    CLOCK_OBJECT_ID,
    systemClock,
} from './types.js';
export type {
    SuiAddress,
    Hash32,
    Clock,
    MigrationCoinTypes,
    ClmmPoolInfo,
    ClmmPosition,
    ClmmVenue,
    PairKey,
    PairReserves,
    InitializeParams,
    LiquidationParams,
    NewPoolParams,
    FinalizeResult,
    VaultBalances,
    VaultReader,
    MigrationSnapshot,
} from './types.js';

// Errors
export {
    MigrationError,
    AuthorizationError,
    StateError,
    QuotaExceededError,
    ProofInvalidError,
    ArithmeticError,
    ArithmeticOverflowError,
    InvalidSupplyError,
    InsufficientBalanceError,
    InvalidParamsError,
} from './errors.js';
export type { MigrationErrorCode, StateErrorReason } from './errors.js';

// Math (mirrors on-chain pricing)
export {
    assertU64,
    assertU128,
    computeRatio,
    scaleByRatio,
    computeMarketCap,
    computeInitialSqrtPrice,
    invertSqrtPrice,
    isqrt,
    sqrtPriceToPrice,
    formatRatio,
} from './math.js';

// Coins
export { Balance, TreasuryCap, isBalanceOf } from './balance.js';

// Snapshot
export {
    LEAF_DOMAIN,
    HASH_LENGTH,
    normalizeParticipant,
    leafHash,
    hashPair,
    computeRoot,
    isValidProof,
    verifyProof,
    parseHash,
    formatHash,
    SnapshotTree,
} from './snapshot.js';
export type { SnapshotEntry, SnapshotDistribution } from './snapshot.js';

// Vault & ledger
export { EscrowVault } from './vault.js';
export { ParticipantLedger } from './ledger.js';

// AMM adapter
export { AmmAdapter } from './amm-adapter.js';
export type { AmmAdapterConfig } from './amm-adapter.js';

// Controller
export { MigrationController, AdminCap } from './controller.js';
export type { MigrationControllerOptions } from './controller.js';

// Events
export {
    MIGRATION_EVENT_TYPES,
    MigrationEventLog,
    LoggingEventSink,
    emitSafely,
} from './events.js';
export type {
    EventSink,
    MigrationEvent,
    MigrationEventType,
    MigrationInitializedEvent,
    LiquidityLockedEvent,
    UserMigratedEvent,
    MigrationFinalizedEvent,
    PoolCreatedEvent,
    ReceiptClaimedEvent,
} from './events.js';

// Ambient
export { ConsoleLogger, createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig, engineConfigFromEnv } from './config.js';
export type { MigrationEngineConfig } from './config.js';
export { KeyedMutex } from './mutex.js';

// PTB builder
export { MigrationTxBuilder, encodeTick } from './ptb-builder.js';
export type { MigrationPackageConfig } from './ptb-builder.js';
