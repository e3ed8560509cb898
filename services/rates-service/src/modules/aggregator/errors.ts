import { ERRORS } from '@fxhub/domain';

export class NoSourcesAvailableError extends Error {
  readonly code = 'NO_SOURCES_AVAILABLE';

  constructor(readonly attempted: string[]) {
    super(attempted.length === 0 ? 'No rate source selected.' : `Every rate source failed: ${attempted.join(', ')}.`);
    this.name = 'NoSourcesAvailableError';
  }
}

export class NoValidRatesError extends Error {
  readonly code = 'NO_VALID_RATES';

  constructor(readonly rejected: number) {
    super(`${ERRORS.NO_VALID_RATES.message} ${rejected} rate(s) rejected.`);
    this.name = 'NoValidRatesError';
  }
}

export class RunCancelledError extends Error {
  readonly code = 'RUN_CANCELLED';

  constructor() {
    super(ERRORS.RUN_CANCELLED.message);
    this.name = 'RunCancelledError';
  }
}
