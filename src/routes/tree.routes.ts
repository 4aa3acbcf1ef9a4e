import { Router } from 'express';
import { createTreeController } from '../controllers/tree.controller.js';
import type { AppContext } from '../context.js';

export const createTreeRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const treeController = createTreeController(context);

  router.get('/summary', treeController.summary);
  router.get('/root', treeController.root);
  router.get('/ancestors', treeController.ancestors);
  router.get('/search', treeController.search);

  return router;
};

export const createIndividualRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const treeController = createTreeController(context);

  router.get('/:id', treeController.getIndividual);
  router.get('/:id/relatives', treeController.relatives);

  return router;
};
