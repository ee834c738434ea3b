import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../utils/errors';

export type RequestSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export type ValidatedHandler<T> = (input: T, req: Request, res: Response) => Promise<void>;

/**
 * Parses body, query and params against `schema`. Field errors are grouped
 * by path under `details.fields`.
 */
export function parseRequest<T>(schema: RequestSchema<T>, req: Request): T {
  try {
    return schema.parse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const details: Record<string, string[]> = {};

      error.errors.forEach((err) => {
        const path = err.path.join('.');
        if (!details[path]) {
          details[path] = [];
        }
        details[path].push(err.message);
      });

      throw new ValidationError('Validation failed', { fields: details });
    }
    throw error;
  }
}

/** Wraps a controller so it receives the parsed, transformed request input. */
export const validate = <T>(schema: RequestSchema<T>, handler: ValidatedHandler<T>) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(parseRequest(schema, req), req, res);
    } catch (error) {
      next(error);
    }
  };
};
