import type { Express } from 'express';
import type { ILogger, IModule, IModuleMetadata, IViewResolver } from '@handheld/types';
import { logger } from '../../lib/logger.js';
import type { MobileModule } from '../mobile/MobileModule.js';
import type { MobileConfig } from '../mobile/services/mobile-config.js';
import { ViewPathSet } from '../views/services/view-path-set.js';
import type { ViewRenderer } from '../views/services/view-renderer.js';
import { createPagesRouter } from './api/pages.routes.js';

/**
 * Dependencies required by the pages module.
 */
export interface IPagesModuleDependencies {
    app: Express;

    /**
     * Mobile module the pages router takes its configuration and hook from.
     */
    mobile: MobileModule;

    renderer: ViewRenderer;

    /**
     * Resolvers the page templates are read from.
     */
    viewPaths: readonly IViewResolver[];
}

/**
 * Public pages rendered from markdown view templates.
 */
export class PagesModule implements IModule<IPagesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'pages',
        name: 'Pages',
        version: '1.0.0',
        description: 'Public pages with mobile-specific templates'
    };

    private app!: Express;
    private mobile!: MobileModule;
    private renderer!: ViewRenderer;
    private config!: MobileConfig;
    private paths!: ViewPathSet;

    private readonly logger: ILogger;

    constructor(moduleLogger: ILogger = logger.child({ module: 'pages' })) {
        this.logger = moduleLogger;
    }

    async init(dependencies: IPagesModuleDependencies): Promise<void> {
        this.app = dependencies.app;
        this.mobile = dependencies.mobile;
        this.renderer = dependencies.renderer;

        this.config = this.mobile.createConfig();
        // Real templates first: the fallback only answers when no mobile template exists
        this.paths = new ViewPathSet(dependencies.viewPaths).append(this.config.fallbackResolver);

        this.logger.info({ viewPaths: this.paths.size }, 'Pages module initialized');
    }

    async run(): Promise<void> {
        const router = createPagesRouter(this.renderer, this.paths, this.mobile.middleware(this.config));
        this.app.use('/', router);
        this.logger.info('Pages router mounted at /');
    }
}
