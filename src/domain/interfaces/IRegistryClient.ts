/**
 * Registry Client Interface — Lookup Stage Contract
 * Layer: Domain
 *
 * Looks a company up by name in the business registry. Every way the lookup
 * can fail is one `LookupError` variant; implementations return them rather
 * than throwing, so the pipeline can decide what the user sees.
 */
import type { BusinessRecord } from '@domain/entities/BusinessRecord';
import type { Result } from '@shared/result';

export type LookupError =
  /** No registry credential configured. Nothing was sent. */
  | { kind: 'config' }
  /** Connection failure, timeout, or a non-2xx HTTP status. */
  | { kind: 'network'; message: string; status?: number }
  /** Body was not JSON, or not a JSON object. */
  | { kind: 'decode'; message: string }
  /** Registry answered with a non-zero error_code. */
  | { kind: 'provider'; code: number | null; reason: string }
  /** Registry answered OK but with no result. */
  | { kind: 'not_found' };

export interface IRegistryClient {
  /** `name` must already be trimmed and non-empty. */
  lookup(name: string): Promise<Result<BusinessRecord, LookupError>>;

  /** True when a credential is present; lets callers refuse before any I/O. */
  isConfigured(): boolean;
}
