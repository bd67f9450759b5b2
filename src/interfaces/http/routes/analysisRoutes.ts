/**
 * Analysis Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /analyze  { "company_name": "测试科技有限公司" }  →  controller.analyze
 *
 * Mounted at the root in app.ts; the bundled page posts here.
 */
import { AnalysisController } from '@interfaces/http/controllers/AnalysisController';
import { validate } from '@interfaces/http/middleware/validation';
import { analyzeBodySchema } from '@interfaces/http/schemas/analyzeSchema';
import { Router } from 'express';

const router = Router();
const controller = new AnalysisController();

router.post('/analyze', validate(analyzeBodySchema, 'body'), controller.analyze);

export { router as analysisRoutes };
