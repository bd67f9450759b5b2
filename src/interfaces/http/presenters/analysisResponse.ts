/**
 * Analysis Response Assembler
 * Layer: Interfaces (HTTP)
 *
 * Maps a PipelineResult onto a status code and the standard envelope:
 *
 *   success                         → 200 { status: 'success', data }
 *   validation                      → 400
 *   lookup, config                  → 500  (operator has to set the token)
 *   lookup, anything else           → 404  (one message, whatever the cause)
 *   generation, config              → 500
 *   generation, transport           → 500  "temporarily unreachable"
 *   generation, rejected/malformed  → 500  "generation failed"
 *
 * Provider messages are never copied into the response; they are already
 * in the logs. After a generation failure the registry data is dropped.
 */
import type { PipelineResult } from '@domain/entities/PipelineResult';
import { MESSAGES } from '@shared/constants';
import type { AnalysisPayload, ErrorEnvelope, SuccessEnvelope } from '@shared/types';

export interface AnalysisResponse {
  statusCode: number;
  body: SuccessEnvelope<AnalysisPayload> | ErrorEnvelope;
}

function failure(statusCode: number, message: string): AnalysisResponse {
  return { statusCode, body: { status: 'error', message } };
}

export function toAnalysisResponse(result: PipelineResult): AnalysisResponse {
  if (result.ok) {
    return {
      statusCode: 200,
      body: {
        status: 'success',
        data: {
          companyName: result.companyName,
          rawData: result.record,
          report: result.report,
        },
      },
    };
  }

  switch (result.stage) {
    case 'validation':
      return failure(400, MESSAGES.EMPTY_COMPANY_NAME);

    case 'lookup':
      return result.error.kind === 'config'
        ? failure(500, MESSAGES.NOT_CONFIGURED)
        : failure(404, MESSAGES.lookupFailed(result.companyName));

    case 'generation':
      switch (result.error.kind) {
        case 'config':
          return failure(500, MESSAGES.NOT_CONFIGURED);
        case 'transport':
          return failure(500, MESSAGES.GENERATION_UNREACHABLE);
        default:
          return failure(500, MESSAGES.GENERATION_FAILED);
      }
  }
}
