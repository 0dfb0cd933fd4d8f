/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import type { IMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { MemoryViewResolver } from '../../../tests/vitest/mocks/view-resolver.js';
import { MissingTemplateError } from '../../../lib/errors.js';
import { FallbackViewResolver } from '../services/fallback-view.resolver.js';
import { MarkdownService } from '../services/markdown.service.js';
import { ViewPathSet } from '../services/view-path-set.js';
import { ViewRenderer } from '../services/view-renderer.js';

const templates = {
    'pages/home.html': '---\ntitle: "Home"\n---\n# Desktop',
    'pages/home.mobile': '---\ntitle: "Home"\n---\n# Mobile',
    'pages/about.html': '# About'
};

describe('ViewRenderer', () => {
    let logger: IMockLogger;
    let renderer: ViewRenderer;
    let memory: MemoryViewResolver;
    let fallback: FallbackViewResolver;
    let paths: ViewPathSet;

    beforeEach(() => {
        logger = createMockLogger();
        renderer = new ViewRenderer(new MarkdownService(), logger);
        memory = new MemoryViewResolver(templates);
        fallback = new FallbackViewResolver([memory]);
        fallback.useFallback('html');
        paths = new ViewPathSet([memory]).append(fallback);
    });

    it('should render the template of the requested format', async () => {
        const view = await renderer.render('pages/home', 'mobile', paths);

        expect(view.title).toBe('Home');
        expect(view.template.format).toBe('mobile');
        expect(view.html).toContain('<h1>Mobile</h1>');
        expect(logger.debug).not.toHaveBeenCalled();
    });

    it('should render the fallback template when no mobile template exists', async () => {
        const view = await renderer.render('pages/about', 'mobile', paths);

        expect(view.title).toBeUndefined();
        expect(view.template.format).toBe('html');
        expect(view.html).toContain('<h1>About</h1>');
        expect(logger.debug).toHaveBeenCalledWith(
            { view: 'pages/about', requested: 'mobile', rendered: 'html' },
            'Rendering fallback template'
        );
    });

    it('should fail when the fallback is disabled', async () => {
        fallback.useFallback(false);

        const rendering = renderer.render('pages/about', 'mobile', paths);

        await expect(rendering).rejects.toBeInstanceOf(MissingTemplateError);
        await expect(rendering).rejects.toThrow('Missing template pages/about for format mobile');
    });

    it('should fail for unknown views', async () => {
        await expect(renderer.render('pages/missing', 'html', paths)).rejects.toMatchObject({
            code: 'MISSING_TEMPLATE',
            details: { view: 'pages/missing', format: 'html' }
        });
    });
});
