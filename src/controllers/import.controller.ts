import { Request, Response } from 'express';
import { z } from 'zod';
import { sendError, sendOk } from '../utils/response.js';
import type { AppContext } from '../context.js';
import type { ImportReport } from '../services/import.service.js';

const directorySchema = z.object({
  path: z.string({ required_error: 'Directory path is required' }).min(1, 'Directory path is required'),
  force: z.boolean().default(false)
});

const isForced = (req: Request): boolean => req.query.force === 'true' || req.query.force === '1';

const summarize = (report: ImportReport): string =>
  `Imported ${report.imported.length} file(s), skipped ${report.skipped.length}, ${report.warnings.length} warning(s)`;

export const createImportController = (context: AppContext) => {
  /**
   * 扫描本地目录并导入识别到的文件
   */
  const importDirectory = async (req: Request, res: Response): Promise<void> => {
    try {
      const { path, force } = directorySchema.parse(req.body ?? {});
      const report = await context.importer.importDirectory(path, { force });
      sendOk(res, summarize(report), report, 201);
    } catch (error) {
      sendError(res, error, 'Failed to import directory');
    }
  };

  const uploadHandler =
    (kind: 'genome' | 'gedcom') =>
    async (req: Request, res: Response): Promise<void> => {
      try {
        if (!req.file) {
          res.status(400).json({ code: 400, message: 'No file uploaded' });
          return;
        }
        const content = req.file.buffer.toString('utf-8');
        const sourceFile = req.file.originalname;
        const options = { force: isForced(req) };
        const report =
          kind === 'genome'
            ? await context.importer.importGenome(content, sourceFile, options)
            : await context.importer.importGedcom(content, sourceFile, options);
        sendOk(res, summarize(report), report, 201);
      } catch (error) {
        sendError(res, error, `Failed to import ${kind} file`);
      }
    };

  return {
    importDirectory,
    importGenome: uploadHandler('genome'),
    importGedcom: uploadHandler('gedcom')
  };
};
