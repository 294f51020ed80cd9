import { Router } from 'express';
import { TriageController } from '../controllers/TriageController';
import { DeferredEmailRepository } from '../repositories/DeferredEmailRepository';
import { TriagePipeline } from '../services/triage/TriagePipeline';
import { TriageService } from '../services/triage/TriageService';
import { getTriageConfig } from '../config/triage';
import { getDatabase } from '../config/database';

/**
 * Initialize and configure all API routes
 */
export async function createRoutes(): Promise<Router> {
  const router = Router();

  // Configuration is validated here, before any request is served
  const config = getTriageConfig();
  const db = await getDatabase();

  // Initialize repositories and services
  const deferredRepository = new DeferredEmailRepository(db);
  const pipeline = new TriagePipeline(config);
  const triageService = new TriageService(pipeline, deferredRepository);

  // Initialize controllers
  const triageController = new TriageController(triageService, config);

  // Triage routes
  router.post('/triage', triageController.triage.bind(triageController));
  router.post('/triage/run', triageController.run.bind(triageController));
  router.get('/triage/deferred', triageController.listDeferred.bind(triageController));

  // Guardrail routes
  router.post('/guardrails/check', triageController.checkGuardrails.bind(triageController));

  // Configuration
  router.get('/config', triageController.getConfig.bind(triageController));

  return router;
}
