import type { IViewResolver, IViewTemplate } from '@handheld/types';

/**
 * Supplies fallback templates for mobile requests.
 *
 * When a mobile template is missing, this resolver repeats the lookup with the
 * fallback format against the same view paths. It answers nothing for any
 * other format, and nothing at all once the fallback is disabled.
 */
export class FallbackViewResolver implements IViewResolver {
    private fallBack: string | false = false;

    /**
     * @param resolvers - View paths searched with the fallback format
     * @param mobileFormat - Format that triggers the fallback lookup
     */
    constructor(
        private readonly resolvers: readonly IViewResolver[],
        private readonly mobileFormat = 'mobile'
    ) {}

    /**
     * Sets the format to fall back to, or `false` to turn the fallback off.
     */
    useFallback(format: string | false): void {
        this.fallBack = format;
    }

    get fallbackFormat(): string | false {
        return this.fallBack;
    }

    async find(name: string, format: string): Promise<IViewTemplate | null> {
        if (format !== this.mobileFormat || this.fallBack === false || this.fallBack === this.mobileFormat) {
            return null;
        }

        for (const resolver of this.resolvers) {
            const template = await resolver.find(name, this.fallBack);
            if (template) {
                return template;
            }
        }
        return null;
    }
}
