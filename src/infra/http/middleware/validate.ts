import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Zod validation middleware. Rejects the request before the handler runs;
 * the handler parses again to get typed values, so the request is left as is.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      schemas.body?.parse(req.body);
      schemas.params?.parse(req.params);
      schemas.query?.parse(req.query);
      next();
    } catch (error) {
      // ZodError is rendered by errorHandler
      next(error);
    }
  };
}
