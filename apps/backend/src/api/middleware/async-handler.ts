import type { NextFunction, Request, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Forwards rejected promises to the error middleware instead of leaving them
 * unhandled.
 *
 * @example
 * router.get('/', asyncHandler(async (req, res) => {
 *   const view = await renderer.render('pages/home', 'html', paths);
 *   res.send(view.html);
 * }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
