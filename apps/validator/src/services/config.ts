import type { LevelWithSilent } from 'pino';
import { DIFFICULTY_TIERS, isDifficultyTier } from '../engine/tiers.js';
import type { DifficultyTier } from '../types/domain.js';
import type { AccessKeys } from './access.js';
import { EMA_ALPHA, INITIAL_TRUST } from './trust.js';

export type LedgerMode = 'local' | 'chain';

export type ValidatorConfig = {
  port: number;
  logLevel: LevelWithSilent;
  dbFile: string;
  roundTimeoutMs: number;
  roundSleepMs: number;
  sampleSize: number;
  tiers: DifficultyTier[];
  trustAlpha: number;
  trustInitial: number;
  schedulerAutostart: boolean;
  maxResponseBytes: number;
  ledger: {
    mode: LedgerMode;
    rpcUrl?: string;
    contractAddress?: string;
    signerPrivateKey?: string;
  };
  weights: {
    beta: number;
    burnFraction: number;
    burnId?: string;
  };
  access: AccessKeys;
  rateLimit: {
    max: number;
    timeWindow: string;
  };
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function boundedPositiveInteger(value: string | undefined, fallback: number, max: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.min(Math.floor(parsed), max);
}

function boundedFraction(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
}

function trimmed(value: string | undefined): string | undefined {
  const result = value?.trim();
  return result ? result : undefined;
}

function parseTiers(value: string | undefined): DifficultyTier[] {
  if (!value) return [...DIFFICULTY_TIERS];
  const tiers = value
    .split(',')
    .map((part) => Number(part.trim()))
    .filter(isDifficultyTier);
  return tiers.length > 0 ? tiers : [...DIFFICULTY_TIERS];
}

function parseLogLevel(value: string | undefined): LevelWithSilent {
  const level = value?.trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
}

export function loadValidatorConfig(env: Env = process.env): ValidatorConfig {
  return {
    port: boundedPositiveInteger(env.PORT, 3000, 65_535),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    dbFile: trimmed(env.VALIDATOR_DB_FILE) ?? '.data/validator.sqlite',
    roundTimeoutMs: boundedPositiveInteger(env.ROUND_TIMEOUT_MS, 30_000, 600_000),
    roundSleepMs: boundedPositiveInteger(env.ROUND_SLEEP_MS, 300_000, 86_400_000),
    sampleSize: boundedPositiveInteger(env.ROUND_SAMPLE_SIZE, 256, 4096),
    tiers: parseTiers(env.ROUND_TIERS),
    trustAlpha: boundedFraction(env.TRUST_ALPHA, EMA_ALPHA, 0.001, 1),
    trustInitial: boundedFraction(env.TRUST_INITIAL, INITIAL_TRUST, 0, 1),
    schedulerAutostart: env.SCHEDULER_AUTOSTART !== 'false',
    maxResponseBytes: boundedPositiveInteger(env.PARTICIPANT_MAX_RESPONSE_BYTES, 4 * 1024 * 1024, 64 * 1024 * 1024),
    ledger: {
      mode: env.LEDGER_MODE === 'chain' ? 'chain' : 'local',
      rpcUrl: trimmed(env.LEDGER_RPC_URL),
      contractAddress: trimmed(env.LEDGER_CONTRACT_ADDRESS),
      signerPrivateKey: trimmed(env.LEDGER_SIGNER_PRIVATE_KEY)
    },
    weights: {
      beta: boundedFraction(env.WEIGHT_BOOST_BETA, 5, 0, 50),
      burnFraction: boundedFraction(env.WEIGHT_BURN_FRACTION, 0, 0, 1),
      burnId: trimmed(env.WEIGHT_BURN_ID)
    },
    access: {
      admin: trimmed(env.ADMIN_API_KEY),
      operator: trimmed(env.OPERATOR_API_KEY),
      readonly: trimmed(env.READONLY_API_KEY),
      allowPublicRead: env.ALLOW_PUBLIC_READ !== 'false'
    },
    rateLimit: {
      max: boundedPositiveInteger(env.API_RATE_LIMIT_MAX, 120, 100_000),
      timeWindow: trimmed(env.API_RATE_LIMIT_WINDOW) ?? '1 minute'
    }
  };
}
