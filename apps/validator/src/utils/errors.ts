export type ValidatorErrorCode =
  | 'generation_budget_exhausted'
  | 'publication_failed'
  | 'round_aborted'
  | 'round_in_flight'
  | 'no_participants';

export class ValidatorError extends Error {
  constructor(
    readonly code: ValidatorErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The map generator could not draw a solvable layout within its attempt budget. */
export class GenerationError extends ValidatorError {
  constructor(
    readonly seed: number,
    readonly tier: number,
    readonly attempts: number,
    readonly lastRejection: string
  ) {
    super(
      'generation_budget_exhausted',
      `no solvable layout for seed ${seed} tier ${tier} after ${attempts} attempts (${lastRejection})`
    );
  }
}

export class PublicationError extends ValidatorError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('publication_failed', `trust snapshot publication failed: ${reason}`, options);
  }
}

export class RoundAbortedError extends ValidatorError {
  constructor(phase: string) {
    super('round_aborted', `round aborted before ${phase}`);
  }
}

export function errorMessage(error: unknown, fallback = 'unknown_error'): string {
  return error instanceof Error ? error.message : fallback;
}
