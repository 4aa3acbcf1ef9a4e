import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createImportRoutes } from './routes/import.routes.js';
import { createGenotypeRoutes, createReportRoutes } from './routes/genotype.routes.js';
import { createIndividualRoutes, createTreeRoutes } from './routes/tree.routes.js';
import { createStatusRoutes } from './routes/status.routes.js';
import { serverLogger } from './utils/logger.js';
import type { AppContext } from './context.js';

/**
 * 构建 Express 应用，不监听端口 (由 index.ts 启动)
 */
export const createApp = (context: AppContext): Express => {
  const app: Express = express();

  // 禁用 ETag 缓存，导入后查询结果会变化
  app.disable('etag');

  app.use(cors({ origin: context.settings.corsOrigin }));
  app.use(express.json());

  // 注册路由
  app.use('/api/status', createStatusRoutes(context));
  app.use('/api/imports', createImportRoutes(context));
  app.use('/api/genotypes', createGenotypeRoutes(context));
  app.use('/api/reports', createReportRoutes(context));
  app.use('/api/tree', createTreeRoutes(context));
  app.use('/api/individuals', createIndividualRoutes(context));

  // 专门处理 Multer 错误的中间件
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      if (err.code === 'LIMIT_FILE_SIZE') {
        res.status(400).json({
          code: 400,
          message: `File too large. Please upload a file smaller than ${context.settings.uploadMaxMb}MB.`
        });
        return;
      }
      res.status(400).json({ code: 400, message: `File upload error: ${err.message}` });
      return;
    }
    // 如果不是 Multer 错误，则传递给下一个错误处理器
    next(err);
  });

  // 通用错误处理中间件
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    serverLogger.error('Unhandled request error:', err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ code: 500, message: 'Internal server error', error: err.message });
  });

  return app;
};
