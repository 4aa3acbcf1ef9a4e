import { Router } from 'express';
import { createStatusController } from '../controllers/status.controller.js';
import type { AppContext } from '../context.js';

export const createStatusRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const statusController = createStatusController(context);

  router.get('/', statusController.getStatus);

  return router;
};
