/**
 * Analysis Controller — HTTP Boundary for the Pipeline
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: the body has already been checked by validate(), the
 * service runs the pipeline, the presenter picks status and envelope. The
 * handler is an arrow function so `this` survives being passed to Express.
 */
import { AnalysisService } from '@application/services/AnalysisService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { toAnalysisResponse } from '@interfaces/http/presenters/analysisResponse';
import type { AnalyzeRequestBody } from '@shared/types';
import type { Request, Response } from 'express';

export class AnalysisController {
  private service: AnalysisService;

  constructor() {
    this.service = container.resolve<AnalysisService>(TOKENS.AnalysisService);
  }

  analyze = async (req: Request, res: Response): Promise<void> => {
    const body: AnalyzeRequestBody = req.body;
    const result = await this.service.analyze(body.company_name);
    const response = toAnalysisResponse(result);

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(response.statusCode).json(
      response.body.status === 'success' && totalTimeMs != null
        ? { ...response.body, meta: { totalTimeMs } }
        : response.body,
    );
  };
}
