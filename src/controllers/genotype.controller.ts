import { Request, Response } from 'express';
import { z } from 'zod';
import { LookupError } from '../utils/errors.js';
import { determineApoeStatus } from '../services/apoe.service.js';
import { sendError, sendOk } from '../utils/response.js';
import type { AppContext } from '../context.js';

const RSID_PATTERN = /^(rs|i)\d+$/i;

const categorySchema = z.enum(['health', 'carrier', 'pharma', 'trait'], {
  errorMap: () => ({ message: 'Category must be one of health, carrier, pharma, trait' })
});

export const createGenotypeController = (context: AppContext) => {
  /**
   * 查询单个位点的原始基因型
   */
  const getCall = async (req: Request, res: Response): Promise<void> => {
    try {
      const rsid = req.params.rsid;
      if (!RSID_PATTERN.test(rsid)) {
        res.status(400).json({ code: 400, message: 'Invalid SNP identifier' });
        return;
      }
      const call = await context.store.getGenotypeCall(rsid.toLowerCase());
      if (!call) {
        throw new LookupError('NotTested', rsid);
      }
      sendOk(res, 'Successfully fetched genotype', call);
    } catch (error) {
      sendError(res, error, 'Failed to get genotype');
    }
  };

  /**
   * 查询单个位点并结合策展注释给出解读
   */
  const interpret = async (req: Request, res: Response): Promise<void> => {
    try {
      const rsid = req.params.rsid;
      if (!RSID_PATTERN.test(rsid)) {
        res.status(400).json({ code: 400, message: 'Invalid SNP identifier' });
        return;
      }
      const result = await context.matcher.lookup(rsid.toLowerCase());
      if (result instanceof LookupError) {
        throw result;
      }
      sendOk(res, 'Successfully interpreted genotype', result);
    } catch (error) {
      sendError(res, error, 'Failed to interpret genotype');
    }
  };

  const apoeReport = async (req: Request, res: Response): Promise<void> => {
    try {
      const status = await determineApoeStatus(context.store);
      sendOk(res, 'Successfully determined APOE status', status);
    } catch (error) {
      sendError(res, error, 'Failed to determine APOE status');
    }
  };

  /**
   * 某一类别 (health / carrier / pharma / trait) 下所有已检出位点的解读
   */
  const categoryReport = async (req: Request, res: Response): Promise<void> => {
    try {
      const category = categorySchema.parse(req.params.category);
      const results = await context.matcher.analyzeCategory(category);
      sendOk(res, `Found ${results.length} ${category} result(s)`, results);
    } catch (error) {
      sendError(res, error, 'Failed to build report');
    }
  };

  return { getCall, interpret, apoeReport, categoryReport };
};
