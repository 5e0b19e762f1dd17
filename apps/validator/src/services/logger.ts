import { pino, type Bindings, type LevelWithSilent } from 'pino';

type LogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

/** The slice of a pino logger the validator uses; Fastify's `app.log` fits it too. */
export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(bindings: Bindings): Logger;
};

export function createLogger(level: LevelWithSilent = 'info', bindings: Bindings = {}): Logger {
  return pino({ level, base: { service: 'aerotrial-validator', ...bindings } });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
