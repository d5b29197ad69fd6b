import { FailedOutcome, describeOutcome } from './request-outcome';

export class RequestError extends Error {
  readonly name = 'RequestError';

  constructor(
    readonly provider: string,
    readonly endpoint: string,
    readonly attempts: number,
    readonly outcome: FailedOutcome,
  ) {
    super(`${provider} ${endpoint} failed after ${attempts} attempt(s): ${describeOutcome(outcome)}`);
  }

  get status(): number | null {
    return 'status' in this.outcome ? this.outcome.status : null;
  }
}

export class DeadlineExceededError extends Error {
  readonly name = 'DeadlineExceededError';

  constructor(readonly provider: string, readonly endpoint: string) {
    super(`Deadline exceeded while calling ${provider} ${endpoint}`);
  }
}
