import { z } from 'zod';
import type { IMobileOptions, IViewResolver } from '@handheld/types';
import { ConfigurationError } from '../../../lib/errors.js';
import { FallbackViewResolver } from '../../views/services/fallback-view.resolver.js';
import { MOBILE_FORMAT } from './mobile-request.js';

export const DEFAULT_MOBILE_OPTIONS: Readonly<IMobileOptions> = Object.freeze({
    fallBack: 'html',
    skipXhrRequests: true
});

const mobileOptionsSchema = z.object({
    fallBack: z.union([
        z.literal(false),
        z
            .string()
            .regex(/^[a-z0-9_]+$/i, 'Fallback format must be a plain format name')
            .refine(format => format.toLowerCase() !== MOBILE_FORMAT, 'Fallback format cannot be the mobile format')
    ]),
    skipXhrRequests: z.boolean()
});

/**
 * Mobile configuration of one router.
 *
 * Holds the options record and the fallback resolver that serves templates in
 * the fallback format when a mobile template is missing. Options are adjusted
 * with `configure()` while the router is being set up; the middleware seals
 * the record on its first request, after which it is read-only.
 *
 * @example
 * const config = new MobileConfig(viewPaths).configure(options => {
 *     options.fallBack = 'html';
 *     options.skipXhrRequests = false;
 * });
 */
export class MobileConfig {
    readonly fallbackResolver: FallbackViewResolver;

    private options: Readonly<IMobileOptions>;
    private sealed = false;

    /**
     * @param viewPaths - Resolvers the fallback lookup searches
     * @param initial - Overrides of the default options
     * @throws ConfigurationError if the options are invalid
     */
    constructor(viewPaths: readonly IViewResolver[], initial: Partial<IMobileOptions> = {}) {
        this.fallbackResolver = new FallbackViewResolver(viewPaths, MOBILE_FORMAT);
        this.options = validate({ ...DEFAULT_MOBILE_OPTIONS, ...initial });
        this.fallbackResolver.useFallback(this.options.fallBack);
    }

    /**
     * Current options. The returned record is frozen.
     */
    get current(): Readonly<IMobileOptions> {
        return this.options;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    /**
     * Adjust the options through a mutable draft and re-point the fallback resolver.
     *
     * @throws ConfigurationError once requests are being served, or if the result is invalid
     */
    configure(configure: (options: IMobileOptions) => void): this {
        if (this.sealed) {
            throw new ConfigurationError('Mobile options cannot change once requests are being handled');
        }

        const draft: IMobileOptions = { ...this.options };
        configure(draft);

        this.options = validate(draft);
        this.fallbackResolver.useFallback(this.options.fallBack);
        return this;
    }

    seal(): void {
        this.sealed = true;
    }
}

function validate(options: IMobileOptions): Readonly<IMobileOptions> {
    const result = mobileOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new ConfigurationError('Invalid mobile options', result.error.flatten());
    }
    return Object.freeze(result.data);
}
