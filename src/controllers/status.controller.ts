import { Request, Response } from 'express';
import { sendError, sendOk } from '../utils/response.js';
import type { AppContext } from '../context.js';

export const createStatusController = (context: AppContext) => {
  /**
   * 当前存储内容概况：记录数、导入来源与时间、注释表版本
   */
  const getStatus = async (req: Request, res: Response): Promise<void> => {
    try {
      const { store } = context;
      const [counts, genomeSource, genomeImportedAt, gedcomSource, gedcomImportedAt, treeGeneration] =
        await Promise.all([
          store.counts(),
          store.getMetadata('genome_source'),
          store.getMetadata('genome_imported_at'),
          store.getMetadata('gedcom_source'),
          store.getMetadata('gedcom_imported_at'),
          store.getTreeGeneration()
        ]);

      sendOk(res, 'Successfully fetched status', {
        counts,
        genome: { source: genomeSource, importedAt: genomeImportedAt },
        tree: { source: gedcomSource, importedAt: gedcomImportedAt, generation: treeGeneration },
        annotations: { version: context.annotations.version, entries: context.annotations.size },
        storeDriver: context.settings.storeDriver
      });
    } catch (error) {
      sendError(res, error, 'Failed to get status');
    }
  };

  return { getStatus };
};
