/**
 * Report Service — Generation Stage
 * Layer: Application
 *
 * BusinessRecord in, AnalysisReport out. Builds the prompt with
 * buildReportPrompt() and makes exactly one completion call; the text that
 * comes back is returned as-is, with no post-validation of its structure.
 */
import { buildReportPrompt } from '@application/prompts/reportPrompt';
import type { ReportConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { AnalysisReport, BusinessRecord } from '@domain/entities/BusinessRecord';
import type { GenerationError } from '@domain/entities/PipelineResult';
import type { ICompletionClient } from '@domain/interfaces/ICompletionClient';
import type { Result } from '@shared/result';
import { inject, injectable } from 'tsyringe';

@injectable()
export class ReportService {
  constructor(
    @inject(TOKENS.CompletionClient) private completion: ICompletionClient,
    @inject(TOKENS.ReportConfig) private options: ReportConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  isConfigured(): boolean {
    return this.completion.isConfigured();
  }

  async generate(record: BusinessRecord): Promise<Result<AnalysisReport, GenerationError>> {
    const prompt = buildReportPrompt(record, this.options);
    this.log.debug({ promptChars: prompt.user.length }, 'Requesting report');

    const result = await this.completion.complete(prompt);
    if (result.ok) {
      this.log.debug({ reportChars: result.value.length }, 'Report generated');
    }
    return result;
  }
}
