import { buildServer } from './app.js';
import { createAccessControl } from './services/access.js';
import { loadValidatorConfig, type ValidatorConfig } from './services/config.js';
import { HttpDispatchChannel } from './services/dispatch.js';
import { ChainLedgerClient, LocalLedgerClient, type LedgerClient } from './services/ledger.js';
import { createLogger, type Logger } from './services/logger.js';
import { createMetrics } from './services/metrics.js';
import { RoundScheduler } from './services/scheduler.js';
import { createStore, openDatabase, type ValidatorStore } from './services/store.js';
import { TrustAggregator } from './services/trust.js';

function createLedger(config: ValidatorConfig, store: ValidatorStore, logger: Logger): LedgerClient {
  const { ledger, weights } = config;
  if (ledger.mode === 'local') return new LocalLedgerClient(store, weights);

  if (!ledger.rpcUrl || !ledger.contractAddress || !ledger.signerPrivateKey) {
    throw new Error('LEDGER_MODE=chain requires LEDGER_RPC_URL, LEDGER_CONTRACT_ADDRESS and LEDGER_SIGNER_PRIVATE_KEY');
  }

  return ChainLedgerClient.connect({
    rpcUrl: ledger.rpcUrl,
    contractAddress: ledger.contractAddress,
    privateKey: ledger.signerPrivateKey,
    weightPolicy: weights,
    archive: store,
    logger
  });
}

const config = loadValidatorConfig();
const logger = createLogger(config.logLevel);
const store = createStore(openDatabase(config.dbFile));
const metrics = createMetrics();
const aggregator = new TrustAggregator(store.trust, {
  alpha: config.trustAlpha,
  initialTrust: config.trustInitial
});

const scheduler = new RoundScheduler(
  {
    ledger: createLedger(config, store, logger),
    dispatch: new HttpDispatchChannel({
      resolveParticipant: (id) => store.getParticipant(id),
      timeoutMs: config.roundTimeoutMs,
      maxResponseBytes: config.maxResponseBytes,
      logger
    }),
    aggregator,
    logger,
    recorder: store,
    metrics
  },
  {
    roundTimeoutMs: config.roundTimeoutMs,
    sampleSize: config.sampleSize,
    tiers: config.tiers
  }
);

const app = await buildServer(
  {
    store,
    aggregator,
    scheduler,
    metrics,
    access: createAccessControl(config.access, (apiKey) => store.findParticipantByApiKey(apiKey))
  },
  { logLevel: config.logLevel, rateLimit: config.rateLimit }
);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'shutting down');
    scheduler.stop();
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      }
    );
  });
}

app.listen({ port: config.port, host: '0.0.0.0' }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});

if (config.schedulerAutostart) {
  scheduler.runForever(config.roundSleepMs).catch((err: unknown) => {
    logger.error({ err }, 'round scheduler crashed');
    process.exit(1);
  });
} else {
  app.log.info('scheduler autostart disabled; use POST /rounds/run');
}
