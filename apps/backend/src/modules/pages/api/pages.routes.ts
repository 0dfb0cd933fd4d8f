import { Router } from 'express';
import type { RequestHandler } from 'express';
import type { IViewResolver } from '@handheld/types';
import { renderView } from '../../views/api/render-view.js';
import type { ViewRenderer } from '../../views/services/view-renderer.js';

/**
 * Create the public page routes.
 *
 * @param renderer - View renderer
 * @param paths - View paths including the router's fallback resolver
 * @param mobileMiddleware - Request hook switching mobile requests to the mobile format
 * @returns Express router mounted at /
 */
export function createPagesRouter(renderer: ViewRenderer, paths: IViewResolver, mobileMiddleware: RequestHandler): Router {
    const router = Router();

    router.use(mobileMiddleware);

    // GET / - Home page, with a dedicated mobile template
    router.get('/', renderView(renderer, paths, 'pages/home'));

    // GET /about - Only an html template; mobile requests fall back to it
    router.get('/about', renderView(renderer, paths, 'pages/about'));

    return router;
}
