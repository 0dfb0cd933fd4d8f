/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import type { IRenderedView } from '@handheld/types';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { asResponse, createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';
import type { MockResponse } from '../../../tests/vitest/mocks/express.js';
import { MemoryViewResolver } from '../../../tests/vitest/mocks/view-resolver.js';
import { MissingTemplateError } from '../../../lib/errors.js';
import { renderDocument, renderView } from '../api/render-view.js';
import { MarkdownService } from '../services/markdown.service.js';
import { ViewRenderer } from '../services/view-renderer.js';

const template = { name: 'pages/home', format: 'html', path: 'memory:pages/home.html', source: '' };

describe('renderDocument', () => {
    it('should wrap desktop views', () => {
        const view: IRenderedView = { html: '<p>x</p>', title: 'Home', template };

        expect(renderDocument(view, 'html')).toBe(
            '<!doctype html>\n<html>\n<head>\n<meta charset="utf-8">\n<title>Home</title>\n</head>\n<body>\n<p>x</p>\n</body>\n</html>\n'
        );
    });

    it('should add a viewport to mobile views and escape the title', () => {
        const view: IRenderedView = { html: '<p>x</p>', title: 'Tom & "Jerry"', template };

        expect(renderDocument(view, 'mobile')).toBe(
            '<!doctype html>\n<html>\n<head>\n<meta charset="utf-8">\n' +
            '<meta name="viewport" content="width=device-width, initial-scale=1">\n' +
            '<title>Tom &amp; &quot;Jerry&quot;</title>\n</head>\n<body>\n<p>x</p>\n</body>\n</html>\n'
        );
    });

    it('should omit the title element without a title', () => {
        const view: IRenderedView = { html: '', template };

        expect(renderDocument(view, 'html')).toBe('<!doctype html>\n<html>\n<head>\n<meta charset="utf-8">\n</head>\n<body>\n\n</body>\n</html>\n');
    });
});

describe('renderView', () => {
    const renderer = new ViewRenderer(new MarkdownService(), createMockLogger());
    const paths = new MemoryViewResolver({
        'pages/home.html': '# Desktop',
        'pages/home.mobile': '# Mobile'
    });

    /**
     * Runs the handler until it either sends a response or calls next.
     */
    function invoke(format: string | undefined, name = 'pages/home') {
        const res: MockResponse = createMockResponse();
        const next = vi.fn();
        const done = new Promise<void>(resolve => {
            res.send.mockImplementation(() => {
                resolve();
                return res;
            });
            next.mockImplementation(() => resolve());
        });

        renderView(renderer, paths, name)(createMockRequest({ format }), asResponse(res), next);

        return done.then(() => ({ res, next }));
    }

    it('should render the view in the request format', async () => {
        const { res, next } = await invoke('mobile');

        expect(res.type).toHaveBeenCalledWith('html');
        expect(res.send).toHaveBeenCalledTimes(1);
        expect(String(res.send.mock.calls[0][0])).toContain('<h1>Mobile</h1>');
        expect(next).not.toHaveBeenCalled();
    });

    it('should default to html when no format was negotiated', async () => {
        const { res } = await invoke(undefined);

        expect(String(res.send.mock.calls[0][0])).toContain('<h1>Desktop</h1>');
    });

    it('should pass missing templates to the error middleware', async () => {
        const { res, next } = await invoke('html', 'pages/missing');

        expect(res.send).not.toHaveBeenCalled();
        expect(next).toHaveBeenCalledWith(expect.any(MissingTemplateError));
    });
});
