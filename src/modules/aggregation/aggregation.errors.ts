import { FilmReference } from '../identity/dto/film-reference.dto';

export type AggregationFailureReason = 'primary_unreachable' | 'primary_not_found' | 'invalid_reference';

export class AggregationError extends Error {
  readonly name = 'AggregationError';

  constructor(
    readonly reason: AggregationFailureReason,
    readonly reference: FilmReference | null,
    message: string,
  ) {
    super(message);
  }

  /** Retrying the same reference cannot succeed. */
  get permanent(): boolean {
    return this.reason !== 'primary_unreachable';
  }
}
