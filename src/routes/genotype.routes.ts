import { Router } from 'express';
import { createGenotypeController } from '../controllers/genotype.controller.js';
import type { AppContext } from '../context.js';

export const createGenotypeRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const genotypeController = createGenotypeController(context);

  router.get('/:rsid', genotypeController.getCall);
  router.get('/:rsid/interpretation', genotypeController.interpret);

  return router;
};

export const createReportRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const genotypeController = createGenotypeController(context);

  // apoe 必须在 :category 之前注册
  router.get('/apoe', genotypeController.apoeReport);
  router.get('/:category', genotypeController.categoryReport);

  return router;
};
