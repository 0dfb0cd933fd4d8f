import type { RequestHandler } from 'express';
import type { IRenderedView, IViewResolver } from '@handheld/types';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { ViewRenderer } from '../services/view-renderer.js';

export const DEFAULT_FORMAT = 'html';

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Wraps a rendered view in a minimal HTML document. Mobile views get a
 * device-width viewport.
 */
export function renderDocument(view: IRenderedView, format: string): string {
    const head = [
        '<meta charset="utf-8">',
        ...(format === 'mobile' ? ['<meta name="viewport" content="width=device-width, initial-scale=1">'] : []),
        ...(view.title ? [`<title>${escapeHtml(view.title)}</title>`] : [])
    ];

    return `<!doctype html>\n<html>\n<head>\n${head.join('\n')}\n</head>\n<body>\n${view.html}\n</body>\n</html>\n`;
}

/**
 * Route handler that renders a view in the request's negotiated format.
 *
 * @param renderer - View renderer
 * @param paths - View paths of the router, fallback resolver included
 * @param name - View name, e.g. `pages/home`
 *
 * @example
 * router.get('/', renderView(renderer, paths, 'pages/home'));
 */
export function renderView(renderer: ViewRenderer, paths: IViewResolver, name: string): RequestHandler {
    return asyncHandler(async (req, res) => {
        const format = req.format ?? DEFAULT_FORMAT;
        const view = await renderer.render(name, format, paths);

        res.type('html').send(renderDocument(view, format));
    });
}
