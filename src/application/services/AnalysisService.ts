/**
 * Analysis Service — The Pipeline
 * Layer: Application
 * Pattern: Facade (one call runs validation, lookup and generation)
 *
 *   analyze("  测试科技有限公司 ")
 *     1. trim; empty → validation failure, nothing sent anywhere
 *     2. both credentials present? otherwise a config failure, nothing sent
 *     3. registry lookup        → lookup failure stops here
 *     4. report generation      → generation failure stops here
 *     5. success { record, report }
 *
 * Each stage runs only after the previous one succeeded; there is no
 * partial result and no retry. The outcome is a PipelineResult value, which
 * interfaces/http/presenters/analysisResponse.ts turns into HTTP.
 */
import { ReportService } from '@application/services/ReportService';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { PipelineResult } from '@domain/entities/PipelineResult';
import type { IRegistryClient } from '@domain/interfaces/IRegistryClient';
import { inject, injectable } from 'tsyringe';

@injectable()
export class AnalysisService {
  constructor(
    @inject(TOKENS.RegistryClient) private registry: IRegistryClient,
    private reports: ReportService,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async analyze(rawName: string): Promise<PipelineResult> {
    const startMs = Date.now();
    const result = await this.run(rawName.trim());

    this.log.info(
      {
        companyName: result.companyName,
        outcome: result.ok ? 'success' : result.stage,
        ...(!result.ok && { reason: result.error.kind }),
        durationMs: Date.now() - startMs,
      },
      'Analysis finished',
    );
    return result;
  }

  private async run(companyName: string): Promise<PipelineResult> {
    if (companyName === '') {
      return { ok: false, stage: 'validation', companyName, error: { kind: 'empty_name' } };
    }

    // No outbound call unless both providers are configured.
    if (!this.registry.isConfigured()) {
      return { ok: false, stage: 'lookup', companyName, error: { kind: 'config' } };
    }
    if (!this.reports.isConfigured()) {
      return { ok: false, stage: 'generation', companyName, error: { kind: 'config' } };
    }

    const lookup = await this.registry.lookup(companyName);
    if (!lookup.ok) {
      return { ok: false, stage: 'lookup', companyName, error: lookup.error };
    }

    const report = await this.reports.generate(lookup.value);
    if (!report.ok) {
      return { ok: false, stage: 'generation', companyName, error: report.error };
    }

    return { ok: true, companyName, record: lookup.value, report: report.value };
  }
}
