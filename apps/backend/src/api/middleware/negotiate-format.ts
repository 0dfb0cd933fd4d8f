import type { NextFunction, Request, Response, RequestHandler } from 'express';

export const REGISTERED_FORMATS: readonly string[] = ['html', 'mobile', 'json'];

/**
 * String value of a query parameter. A repeated parameter
 * (`?format=a&format=b`) yields its last occurrence; nested objects yield nothing.
 */
export function queryString(req: Request, key: string): string | undefined {
  const value: unknown = req.query[key];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' ? last : undefined;
  }
  return undefined;
}

/**
 * Sets `req.format` from the `format` query parameter when it names a
 * registered format, and to `defaultFormat` otherwise.
 */
export function negotiateFormat(formats: readonly string[] = REGISTERED_FORMATS, defaultFormat = 'html'): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const requested = queryString(req, 'format');
    req.format = requested !== undefined && formats.includes(requested) ? requested : defaultFormat;
    next();
  };
}
