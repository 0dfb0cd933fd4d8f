import type { IViewResolver, IViewTemplate } from '@handheld/types';

/**
 * Ordered list of view resolvers. The first resolver that finds a template wins.
 */
export class ViewPathSet implements IViewResolver {
    private readonly resolvers: IViewResolver[];

    constructor(resolvers: readonly IViewResolver[] = []) {
        this.resolvers = [...resolvers];
    }

    append(resolver: IViewResolver): this {
        this.resolvers.push(resolver);
        return this;
    }

    prepend(resolver: IViewResolver): this {
        this.resolvers.unshift(resolver);
        return this;
    }

    get size(): number {
        return this.resolvers.length;
    }

    async find(name: string, format: string): Promise<IViewTemplate | null> {
        for (const resolver of this.resolvers) {
            const template = await resolver.find(name, format);
            if (template) {
                return template;
            }
        }
        return null;
    }
}
