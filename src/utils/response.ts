import { Response } from 'express';
import { ZodError } from 'zod';
import {
  AmbiguousRootError,
  FormatError,
  ImportConflictError,
  LookupError,
  NotFoundError,
  StoreBusyError
} from './errors.js';
import { serverLogger } from './logger.js';

export const sendOk = (res: Response, message: string, data: unknown, status = 200): void => {
  res.status(status).json({ code: status, message, data });
};

/**
 * 把领域错误映射为 HTTP 状态码；未知错误记录日志后返回 500
 */
export const sendError = (res: Response, error: unknown, failure: string): void => {
  if (error instanceof ZodError) {
    res.status(400).json({ code: 400, message: error.issues.map(issue => issue.message).join('; ') });
  } else if (error instanceof FormatError) {
    res.status(422).json({ code: 422, message: error.message });
  } else if (error instanceof LookupError) {
    res.status(404).json({ code: 404, message: error.message, data: { kind: error.kind, rsid: error.rsid } });
  } else if (error instanceof AmbiguousRootError) {
    res.status(409).json({ code: 409, message: error.message, data: { candidates: error.candidateIds } });
  } else if (error instanceof ImportConflictError) {
    res.status(409).json({ code: 409, message: error.message });
  } else if (error instanceof StoreBusyError) {
    res.status(423).json({ code: 423, message: error.message });
  } else if (error instanceof NotFoundError) {
    res.status(404).json({ code: 404, message: error.message });
  } else {
    serverLogger.error(`${failure}:`, error);
    res.status(500).json({ code: 500, message: `${failure}, please try again later` });
  }
};
