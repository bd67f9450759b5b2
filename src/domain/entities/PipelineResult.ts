/**
 * Pipeline Result — Terminal State of One Analysis Run
 * Layer: Domain
 *
 * Validation → Lookup → Generation, stopping at the first failure. A failure
 * names the stage it stopped in and carries that stage's own error type, so
 * the response assembler can pattern-match on `stage` and then `error.kind`.
 */
import type { CompletionError } from '@domain/interfaces/ICompletionClient';
import type { LookupError } from '@domain/interfaces/IRegistryClient';

import type { AnalysisReport, BusinessRecord } from './BusinessRecord';

export type GenerationError = CompletionError;

export type ValidationFailure = { kind: 'empty_name' };

export type PipelineFailure =
  | { ok: false; stage: 'validation'; companyName: string; error: ValidationFailure }
  | { ok: false; stage: 'lookup'; companyName: string; error: LookupError }
  | { ok: false; stage: 'generation'; companyName: string; error: GenerationError };

export type PipelineSuccess = {
  ok: true;
  companyName: string;
  record: BusinessRecord;
  report: AnalysisReport;
};

export type PipelineResult = PipelineSuccess | PipelineFailure;

export type PipelineStage = PipelineFailure['stage'];
