/**
 * Tianyancha Registry Client — Lookup Stage Implementation
 * Layer: Infrastructure
 * Pattern: Adapter (implements IRegistryClient)
 *
 * One GET against the keyword-search endpoint per lookup:
 *
 *   GET {apiUrl}?keyword=<form-encoded name>
 *   Authorization: <token>
 *
 * The body is requested as text and decoded here rather than by axios, so a
 * non-JSON body surfaces as a `decode` error instead of an opaque string.
 * The envelope is `{ error_code, reason?, result? }`; error_code 0 is the
 * only success. No retries: a timeout or a 5xx is reported as `network`.
 */
import type { RegistryConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { isBusinessRecord, type BusinessRecord } from '@domain/entities/BusinessRecord';
import type { IRegistryClient, LookupError } from '@domain/interfaces/IRegistryClient';
import {
  LOG_BODY_PREVIEW_CHARS,
  LOG_TOKEN_PREVIEW_CHARS,
  REGISTRY_DEFAULT_REASON,
  REGISTRY_OK_CODE,
} from '@shared/constants';
import { err, ok, type Result } from '@shared/result';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod/v4';

const registryEnvelopeSchema = z.object({
  error_code: z.unknown(),
  reason: z.unknown(),
  result: z.unknown(),
});

type RegistryEnvelope = z.infer<typeof registryEnvelopeSchema>;

type DecodeError = Extract<LookupError, { kind: 'decode' }>;

/** Builds the axios instance the client sends through (timeout, UA override, raw text body). */
export function createRegistryHttp(cfg: RegistryConfig): AxiosInstance {
  return axios.create({
    timeout: cfg.timeoutMs,
    responseType: 'text',
    ...(cfg.userAgent != null && { headers: { 'User-Agent': cfg.userAgent } }),
  });
}

export class TianyanchaRegistryClient implements IRegistryClient {
  constructor(
    private http: AxiosInstance,
    private cfg: RegistryConfig,
    private log: Logger,
  ) {}

  isConfigured(): boolean {
    return this.cfg.token != null;
  }

  async lookup(name: string): Promise<Result<BusinessRecord, LookupError>> {
    const token = this.cfg.token;
    if (token == null) {
      this.log.error('Registry token is not configured');
      return err({ kind: 'config' });
    }

    const url = this.buildUrl(name);
    this.log.debug(
      { url, token: `${token.slice(0, LOG_TOKEN_PREVIEW_CHARS)}…` },
      'Registry request',
    );

    let raw: unknown;
    try {
      const response = await this.http.get<unknown>(url, { headers: { Authorization: token } });
      raw = response.data;
      this.log.debug(
        { status: response.status, body: preview(raw) },
        'Registry response received',
      );
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        this.log.warn({ status, code: error.code, message: error.message }, 'Registry request failed');
        return err({ kind: 'network', message: error.message, status });
      }
      throw error;
    }

    const decoded = this.decode(raw);
    if (!decoded.ok) {
      this.log.warn({ body: preview(raw) }, decoded.error.message);
      return err(decoded.error);
    }

    return this.interpret(decoded.value);
  }

  /** `URL.searchParams` form-encodes, so spaces become `+` like the registry's own examples. */
  private buildUrl(name: string): string {
    const url = new URL(this.cfg.apiUrl);
    url.searchParams.set('keyword', name);
    return url.toString();
  }

  private decode(raw: unknown): Result<RegistryEnvelope, DecodeError> {
    let parsed: unknown = raw;
    if (typeof raw === 'string') {
      try {
        parsed = JSON.parse(raw);
      } catch {
        return err({ kind: 'decode', message: 'Registry response is not valid JSON' });
      }
    }

    const envelope = registryEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return err({ kind: 'decode', message: 'Registry response is not a JSON object' });
    }
    return ok(envelope.data);
  }

  private interpret(envelope: RegistryEnvelope): Result<BusinessRecord, LookupError> {
    const { error_code: code, reason, result } = envelope;

    if (code !== REGISTRY_OK_CODE) {
      const message = typeof reason === 'string' && reason !== '' ? reason : REGISTRY_DEFAULT_REASON;
      this.log.warn({ code, reason: message }, 'Registry rejected the query');
      return err({
        kind: 'provider',
        code: typeof code === 'number' ? code : null,
        reason: message,
      });
    }

    if (!isBusinessRecord(result) || Object.keys(result).length === 0) {
      this.log.info('Registry returned no result');
      return err({ kind: 'not_found' });
    }

    return ok(result);
  }
}

function preview(raw: unknown): string {
  const text = typeof raw === 'string' ? raw : JSON.stringify(raw) ?? '';
  return text.slice(0, LOG_BODY_PREVIEW_CHARS);
}
