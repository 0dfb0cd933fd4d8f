import type { IViewTemplate } from './IViewTemplate.js';

/**
 * Locates the template for a view name in a given format.
 *
 * Resolvers are chained in an ordered view path set; the first one that
 * returns a template wins.
 */
export interface IViewResolver {
    /**
     * @returns The template, or `null` when this resolver has none
     */
    find(name: string, format: string): Promise<IViewTemplate | null>;
}
