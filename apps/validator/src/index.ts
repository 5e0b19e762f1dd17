export * from './types/domain.js';
export { generate, solvabilityViolation, DEFAULT_GENERATION_POLICY, type GenerationPolicy } from './engine/mapGenerator.js';
export { replay, replayAll, type ReplayOptions } from './engine/replayEngine.js';
export { CAPABILITY_PROFILES, flightPlanSchema, parseFlightPlan } from './engine/flightPlan.js';
export { DIFFICULTY_TIERS, TIER_PROFILES, isDifficultyTier } from './engine/tiers.js';
export { score, compareOutcomes, MIN_SCORE, MAX_SCORE } from './services/reward.js';
export { TrustAggregator, smooth, EMA_ALPHA, INITIAL_TRUST, type TrustPolicy } from './services/trust.js';
export { MemoryTrustStore, SqliteTrustStore, type TrustStore } from './services/trustStore.js';
export { RoundScheduler, type RoundSchedulerConfig, type RoundSchedulerDeps } from './services/scheduler.js';
export {
  HttpDispatchChannel,
  MemoryDispatchChannel,
  type DispatchChannel,
  type DispatchHandle
} from './services/dispatch.js';
export { ChainLedgerClient, LocalLedgerClient, type LedgerClient } from './services/ledger.js';
export { shapeWeights, quantizeU16 } from './services/weights.js';
export { signSnapshotAttestation, snapshotHash } from './services/attestation.js';
export { createStore, openDatabase, type ValidatorStore } from './services/store.js';
export { createLogger, type Logger } from './services/logger.js';
export { loadValidatorConfig, type ValidatorConfig } from './services/config.js';
export { buildServer } from './app.js';
export * from './utils/errors.js';
