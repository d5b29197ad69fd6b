import { errorMessage } from '../../common/error-message';

export type RequestOutcome =
  | { kind: 'ok'; status: number; body: unknown; raw: string }
  | { kind: 'rate_limited'; status: number }
  | { kind: 'client_error'; status: number; snippet: string }
  | { kind: 'server_error'; status: number }
  | { kind: 'transport_error'; message: string; code: string | null }
  | { kind: 'parse_error'; status: number; message: string };

export type FailedOutcome = Exclude<RequestOutcome, { kind: 'ok' }>;

export function classifyResponse(status: number, text: string): RequestOutcome {
  if (status === 429) return { kind: 'rate_limited', status };
  if (status >= 400 && status < 500) {
    return { kind: 'client_error', status, snippet: text.slice(0, 200) };
  }
  if (status >= 500) return { kind: 'server_error', status };

  try {
    return { kind: 'ok', status, body: JSON.parse(text), raw: text };
  } catch (error) {
    return { kind: 'parse_error', status, message: errorMessage(error) };
  }
}

export function describeOutcome(outcome: FailedOutcome): string {
  switch (outcome.kind) {
    case 'rate_limited':
      return `rate limited (HTTP ${outcome.status})`;
    case 'client_error':
      return `client error HTTP ${outcome.status}: ${outcome.snippet}`;
    case 'server_error':
      return `server error HTTP ${outcome.status}`;
    case 'transport_error':
      return `transport error${outcome.code ? ` ${outcome.code}` : ''}: ${outcome.message}`;
    case 'parse_error':
      return `unparseable body (HTTP ${outcome.status}): ${outcome.message}`;
  }
}
