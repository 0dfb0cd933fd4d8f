/**
 * A template located by a view resolver.
 */
export interface IViewTemplate {
    /**
     * Logical view name, e.g. `pages/home`.
     */
    name: string;

    /**
     * Format of the template file that was found. Differs from the requested
     * format when the template came from a fallback lookup.
     */
    format: string;

    /**
     * Absolute path of the template file.
     */
    path: string;

    /**
     * Raw template source (markdown with optional frontmatter).
     */
    source: string;
}
