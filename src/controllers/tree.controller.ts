import { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../utils/errors.js';
import { sendError, sendOk } from '../utils/response.js';
import type { AppContext } from '../context.js';

const ancestorsQuerySchema = z.object({
  person: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  generations: z.coerce
    .number({ invalid_type_error: 'generations must be a number' })
    .int('generations must be an integer')
    .min(0, 'generations must not be negative')
    .optional()
});

const searchQuerySchema = z.object({
  q: z.string({ required_error: 'Search query is required' }).trim()
});

export const createTreeController = (context: AppContext) => {
  const summary = async (req: Request, res: Response): Promise<void> => {
    try {
      const engine = await context.trees.getEngine();
      sendOk(res, 'Successfully fetched tree summary', engine.summary());
    } catch (error) {
      sendError(res, error, 'Failed to get tree summary');
    }
  };

  /**
   * 推断默认的根人物 (启发式)，存在多个不相连分支时返回 409 和候选人
   */
  const root = async (req: Request, res: Response): Promise<void> => {
    try {
      const engine = await context.trees.getEngine();
      sendOk(res, 'Successfully inferred root individual', engine.inferRoot());
    } catch (error) {
      sendError(res, error, 'Failed to infer root individual');
    }
  };

  const ancestors = async (req: Request, res: Response): Promise<void> => {
    try {
      const query = ancestorsQuerySchema.parse(req.query);
      const engine = await context.trees.getEngine();
      const person = engine.resolvePerson({ id: query.person, name: query.name });
      const generations = engine.ancestors(person.id, query.generations);
      sendOk(res, `Found ${generations.length} generation(s) of ancestors`, { person, generations });
    } catch (error) {
      sendError(res, error, 'Failed to list ancestors');
    }
  };

  const search = async (req: Request, res: Response): Promise<void> => {
    try {
      const { q } = searchQuerySchema.parse(req.query);
      const results = await context.store.searchIndividuals(q);
      sendOk(res, `Found ${results.length} matching individual(s)`, results);
    } catch (error) {
      sendError(res, error, 'Failed to search individuals');
    }
  };

  const getIndividual = async (req: Request, res: Response): Promise<void> => {
    try {
      const individual = await context.store.getIndividual(req.params.id);
      if (!individual) {
        throw new NotFoundError(`Individual ${req.params.id} not found`);
      }
      sendOk(res, 'Successfully fetched individual', individual);
    } catch (error) {
      sendError(res, error, 'Failed to get individual');
    }
  };

  const relatives = async (req: Request, res: Response): Promise<void> => {
    try {
      const engine = await context.trees.getEngine();
      sendOk(res, 'Successfully fetched relatives', engine.relatives(req.params.id));
    } catch (error) {
      sendError(res, error, 'Failed to get relatives');
    }
  };

  return { summary, root, ancestors, search, getIndividual, relatives };
};
