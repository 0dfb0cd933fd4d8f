import type { Express } from 'express';
import type { IModule } from '@handheld/types';
import type { EnvConfig } from '../config/env.js';
import { logger } from '../lib/logger.js';
import { MobileModule } from '../modules/mobile/index.js';
import { PagesModule } from '../modules/pages/index.js';
import { FileSystemViewResolver, MarkdownService, ViewRenderer } from '../modules/views/index.js';

export interface ILoadedModules {
    mobile: MobileModule;
    pages: PagesModule;
}

/**
 * Runs the two-phase lifecycle of every module against the app: all
 * `init()` calls complete before the first `run()`.
 */
export async function loadModules(
    app: Express,
    config: Pick<EnvConfig, 'VIEWS_DIR' | 'MOBILE_FALL_BACK' | 'MOBILE_SKIP_XHR_REQUESTS'>
): Promise<ILoadedModules> {
    const viewPaths = [new FileSystemViewResolver(config.VIEWS_DIR)];
    const renderer = new ViewRenderer(new MarkdownService(), logger.child({ module: 'views' }));

    const mobile = new MobileModule();
    const pages = new PagesModule();

    await mobile.init({
        app,
        viewPaths,
        defaults: {
            fallBack: config.MOBILE_FALL_BACK,
            skipXhrRequests: config.MOBILE_SKIP_XHR_REQUESTS
        }
    });
    await pages.init({ app, mobile, renderer, viewPaths });

    const modules: IModule<object>[] = [mobile, pages];
    for (const module of modules) {
        await module.run();
        logger.debug({ module: module.metadata.id }, 'Module running');
    }

    return { mobile, pages };
}
