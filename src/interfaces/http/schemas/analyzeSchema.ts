/**
 * Body schema for POST /analyze. Only the type is checked here; trimming and
 * the empty-name rule belong to the pipeline so the CLI gets them too.
 */
import { MESSAGES } from '@shared/constants';
import { z } from 'zod/v4';

export const analyzeBodySchema = z.object(
  {
    company_name: z.string({ error: MESSAGES.MISSING_COMPANY_NAME }),
  },
  { error: MESSAGES.MISSING_COMPANY_NAME },
);
