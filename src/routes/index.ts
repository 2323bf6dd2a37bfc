import { Router } from 'express';
import { SyncController } from '../controllers/SyncController';
import { AssistantController } from '../controllers/AssistantController';
import { Services } from '../services/container';

/**
 * Configure the API routes over the wired services
 */
export function createRoutes(services: Services, providerQuery: string): Router {
  const router = Router();

  const syncController = new SyncController(services.orchestrator, services.status, services.provider);
  const assistantController = new AssistantController(services.answers, services.gate, services.provider, providerQuery);

  // Sync routes
  router.get('/system-status', syncController.getSystemStatus.bind(syncController));
  router.post('/sync', syncController.startSync.bind(syncController));

  // Assistant routes
  router.post('/ask', assistantController.ask.bind(assistantController));
  router.get('/relevant-emails', assistantController.getRelevantEmails.bind(assistantController));
  router.get('/email-summary', assistantController.getSummary.bind(assistantController));

  return router;
}
