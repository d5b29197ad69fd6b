export class DomainError extends Error {
  readonly name = 'DomainError';
}
