import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Modules follow a two-phase lifecycle so that every module has prepared its
 * services before any of them attaches itself to the application:
 *
 * - `init(dependencies)` stores dependencies, builds services and validates
 *   configuration. It must not mount routes.
 * - `run()` mounts routers and middleware on the injected Express app. All
 *   modules have completed `init()` by then.
 *
 * Either phase throwing aborts bootstrap; there is no degraded mode.
 *
 * ```typescript
 * const mobileModule = new MobileModule();
 * const pagesModule = new PagesModule();
 *
 * await mobileModule.init({ app, viewPaths });
 * await pagesModule.init({ app, mobile: mobileModule, renderer, viewPaths });
 *
 * await mobileModule.run();
 * await pagesModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata for introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module without integrating it with the application.
     *
     * @throws {Error} If initialization fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module: mount routes and middleware.
     *
     * @throws {Error} If activation fails (causes application shutdown)
     */
    run(): Promise<void>;
}
