import { Router } from 'express';
import { createUpload } from '../middleware/upload.middleware.js';
import { createImportController } from '../controllers/import.controller.js';
import type { AppContext } from '../context.js';

export const createImportRoutes = (context: AppContext): Router => {
  const router: Router = Router();
  const upload = createUpload(context.settings.uploadMaxMb);
  const importController = createImportController(context);

  // 本地目录扫描
  router.post('/directory', importController.importDirectory);

  // 单文件上传 (字段名统一为 'file'，?force=true 覆盖已有数据)
  router.post('/genome', upload.single('file'), importController.importGenome);
  router.post('/gedcom', upload.single('file'), importController.importGedcom);

  return router;
};
