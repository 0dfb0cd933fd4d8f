import type { Express, RequestHandler } from 'express';
import type { ILogger, IMobileOptions, IModule, IModuleMetadata, IViewResolver } from '@handheld/types';
import { logger } from '../../lib/logger.js';
import { MobileController } from './api/mobile.controller.js';
import { createMobileMiddleware } from './api/mobile.middleware.js';
import { createMobileRouter } from './api/mobile.routes.js';
import { MobileConfig } from './services/mobile-config.js';
import { CookieOverrideStore } from './services/override-store.js';
import type { IMobileOverrideStore } from './services/override-store.js';

/**
 * Dependencies required by the mobile module.
 */
export interface IMobileModuleDependencies {
    /**
     * Express application instance for mounting the override router.
     */
    app: Express;

    /**
     * Resolvers the fallback lookup searches. Usually the same paths the
     * routers render from.
     */
    viewPaths: readonly IViewResolver[];

    /**
     * Application-wide defaults. Routers start from these and may adjust
     * them through `createConfig()`.
     */
    defaults?: Partial<IMobileOptions>;

    /**
     * Session override store; a signed cookie store when omitted.
     */
    overrideStore?: IMobileOverrideStore;
}

/**
 * Mobile module implementation.
 *
 * Detects requests from mobile devices and switches them to the `mobile`
 * format so views render their mobile template, falling back to the
 * configured format when a view has none. Routers opt in by mounting
 * `middleware()` and rendering from view paths that include their config's
 * fallback resolver.
 */
export class MobileModule implements IModule<IMobileModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'mobile',
        name: 'Mobile Views',
        version: '1.0.0',
        description: 'Mobile request detection with fallback to a default view format'
    };

    private app!: Express;
    private viewPaths: readonly IViewResolver[] = [];
    private defaults: Partial<IMobileOptions> = {};
    private overrideStore!: IMobileOverrideStore;
    private controller!: MobileController;
    private defaultConfig!: MobileConfig;

    private readonly logger: ILogger;

    constructor(moduleLogger: ILogger = logger.child({ module: 'mobile' })) {
        this.logger = moduleLogger;
    }

    /**
     * Initialize the module with injected dependencies.
     *
     * @throws ConfigurationError if the default options are invalid
     */
    async init(dependencies: IMobileModuleDependencies): Promise<void> {
        this.logger.info('Initializing mobile module...');

        this.app = dependencies.app;
        this.viewPaths = dependencies.viewPaths;
        this.defaults = dependencies.defaults ?? {};
        this.overrideStore = dependencies.overrideStore ?? new CookieOverrideStore();

        this.defaultConfig = this.createConfig();
        this.controller = new MobileController(this.overrideStore, this.logger);

        this.logger.info({ options: this.defaultConfig.current }, 'Mobile module initialized');
    }

    /**
     * Mount the override router at /api/mobile.
     */
    async run(): Promise<void> {
        this.logger.info('Running mobile module...');

        const router = createMobileRouter(this.controller, this.middleware(this.defaultConfig));
        this.app.use('/api/mobile', router);
        this.logger.info('Mobile router mounted at /api/mobile');

        this.logger.info('Mobile module running');
    }

    /**
     * Create the mobile configuration of one router, starting from the
     * application defaults.
     *
     * @param configure - Adjusts the options before any request is served
     */
    createConfig(configure?: (options: IMobileOptions) => void): MobileConfig {
        const config = new MobileConfig(this.viewPaths, this.defaults);
        return configure ? config.configure(configure) : config;
    }

    /**
     * Request hook for a router.
     *
     * @param config - The router's configuration; the application defaults when omitted
     */
    middleware(config: MobileConfig = this.defaultConfig): RequestHandler {
        return createMobileMiddleware({
            config,
            overrideStore: this.overrideStore,
            logger: this.logger
        });
    }
}
