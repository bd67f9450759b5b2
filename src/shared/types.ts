/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request/response shapes for the HTTP surface. Every JSON response carries
 * `status`: 'success' responses put their payload under `data`, 'error'
 * responses carry a single human-readable `message`. The error handler and
 * the analysis response assembler both produce this envelope.
 */
import type { AnalysisReport, BusinessRecord } from '@domain/entities/BusinessRecord';

export interface AnalyzeRequestBody {
  company_name: string;
}

/**
 * Timing metadata returned with analysis responses.
 */
export interface ResponseMeta {
  /** Wall-clock time from request arrival to response sent (ms). */
  totalTimeMs?: number;
}

export interface AnalysisPayload {
  companyName: string;
  rawData: BusinessRecord;
  report: AnalysisReport;
}

export interface SuccessEnvelope<T> {
  status: 'success';
  data: T;
  meta?: ResponseMeta;
}

export interface ErrorEnvelope {
  status: 'error';
  message: string;
}
