import { RequestHandler } from 'express';
import { AnyZodObject, ZodError, ZodType, ZodTypeDef } from 'zod';
import ApiError from '../utils/ApiError';

function parseValidationError(error: ZodError) {
  return {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
      code: issue.code,
    })),
  };
}

export function validateBody<T extends AnyZodObject>(schema: T): RequestHandler {
  return (req, _res, next) => {
    const parseResult = schema.safeParse(req.body);
    if (!parseResult.success) {
      next(ApiError.validation(parseValidationError(parseResult.error)));
      return;
    }
    req.body = parseResult.data;
    next();
  };
}

/** Parses query strings or route params inside a handler; throws a 422 ApiError on failure. */
export function parseInput<Output>(schema: ZodType<Output, ZodTypeDef, unknown>, value: unknown): Output {
  const parseResult = schema.safeParse(value);
  if (!parseResult.success) {
    throw ApiError.validation(parseValidationError(parseResult.error));
  }
  return parseResult.data;
}
