import type { IViewResolver, IViewTemplate } from '@handheld/types';

/**
 * In-memory view resolver keyed by `<name>.<format>`.
 */
export class MemoryViewResolver implements IViewResolver {
    readonly lookups: string[] = [];
    private readonly templates = new Map<string, string>();

    constructor(templates: Record<string, string> = {}) {
        for (const [key, source] of Object.entries(templates)) {
            this.templates.set(key, source);
        }
    }

    async find(name: string, format: string): Promise<IViewTemplate | null> {
        const key = `${name}.${format}`;
        this.lookups.push(key);

        const source = this.templates.get(key);
        return source === undefined ? null : { name, format, path: `memory:${key}`, source };
    }
}
