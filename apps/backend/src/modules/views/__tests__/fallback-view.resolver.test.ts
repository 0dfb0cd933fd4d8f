/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { FIXTURE_VIEWS_DIR } from '../../../tests/vitest/fixtures/index.js';
import { MemoryViewResolver } from '../../../tests/vitest/mocks/view-resolver.js';
import { FallbackViewResolver } from '../services/fallback-view.resolver.js';
import { FileSystemViewResolver } from '../services/file-system-view.resolver.js';
import { ViewPathSet } from '../services/view-path-set.js';

describe('FallbackViewResolver', () => {
    it('should be disabled until a fallback is set', async () => {
        const fallback = new FallbackViewResolver([new MemoryViewResolver({ 'pages/about.html': '# About' })]);

        expect(fallback.fallbackFormat).toBe(false);
        expect(await fallback.find('pages/about', 'mobile')).toBeNull();
    });

    it('should look up the fallback format for mobile requests', async () => {
        const fallback = new FallbackViewResolver([new MemoryViewResolver({ 'pages/about.html': '# About' })]);
        fallback.useFallback('html');

        const template = await fallback.find('pages/about', 'mobile');

        expect(template).toEqual({
            name: 'pages/about',
            format: 'html',
            path: 'memory:pages/about.html',
            source: '# About'
        });
    });

    it('should not answer other formats', async () => {
        const memory = new MemoryViewResolver({ 'pages/about.html': '# About' });
        const fallback = new FallbackViewResolver([memory]);
        fallback.useFallback('html');

        expect(await fallback.find('pages/about', 'json')).toBeNull();
        expect(memory.lookups).toEqual([]);
    });

    it('should search its resolvers in order', async () => {
        const first = new MemoryViewResolver({});
        const second = new MemoryViewResolver({ 'pages/about.html': '# Second' });
        const third = new MemoryViewResolver({ 'pages/about.html': '# Third' });
        const fallback = new FallbackViewResolver([first, second, third]);
        fallback.useFallback('html');

        const template = await fallback.find('pages/about', 'mobile');

        expect(template?.source).toBe('# Second');
        expect(first.lookups).toEqual(['pages/about.html']);
        expect(third.lookups).toEqual([]);
    });

    it('should stop answering once the fallback is turned off', async () => {
        const fallback = new FallbackViewResolver([new MemoryViewResolver({ 'pages/about.html': '# About' })]);
        fallback.useFallback('html');
        fallback.useFallback(false);

        expect(await fallback.find('pages/about', 'mobile')).toBeNull();
    });
});

describe('ViewPathSet', () => {
    it('should return the first template found', async () => {
        const paths = new ViewPathSet([
            new MemoryViewResolver({ 'pages/home.html': '# First' }),
            new MemoryViewResolver({ 'pages/home.html': '# Second' })
        ]);

        expect((await paths.find('pages/home', 'html'))?.source).toBe('# First');
    });

    it('should give prepended resolvers precedence', async () => {
        const paths = new ViewPathSet([new MemoryViewResolver({ 'pages/home.html': '# Base' })])
            .prepend(new MemoryViewResolver({ 'pages/home.html': '# Override' }));

        expect(paths.size).toBe(2);
        expect((await paths.find('pages/home', 'html'))?.source).toBe('# Override');
    });

    it('should return null when no resolver has the template', async () => {
        const paths = new ViewPathSet([new MemoryViewResolver({})]);

        expect(await paths.find('pages/home', 'html')).toBeNull();
    });

    it('should prefer a real mobile template over the appended fallback', async () => {
        const base = new FileSystemViewResolver(FIXTURE_VIEWS_DIR);
        const fallback = new FallbackViewResolver([base]);
        fallback.useFallback('html');
        const paths = new ViewPathSet([base]).append(fallback);

        const home = await paths.find('pages/home', 'mobile');
        const about = await paths.find('pages/about', 'mobile');

        expect(home?.format).toBe('mobile');
        expect(about?.format).toBe('html');
        expect(about?.source).toContain('Desktop about fixture.');
    });
});
