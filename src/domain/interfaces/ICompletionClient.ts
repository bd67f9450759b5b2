/**
 * Completion Client Interface — Chat-Completion Provider Contract
 * Layer: Domain
 *
 * One non-streaming request per call, never retried. Failures are reported
 * as a small closed set so callers can tell "could not reach the provider"
 * from "the provider said no" from "the provider answered nonsense".
 */
import type { Result } from '@shared/result';

export interface CompletionRequest {
  system: string;
  user: string;
}

export type CompletionError =
  | { kind: 'config' }
  | { kind: 'transport'; message: string }
  | { kind: 'rejected'; status: number | null; message: string }
  | { kind: 'malformed'; message: string };

export interface ICompletionClient {
  complete(request: CompletionRequest): Promise<Result<string, CompletionError>>;

  isConfigured(): boolean;
}
