import type { IViewTemplate } from './IViewTemplate.js';

/**
 * Result of rendering a view template to HTML.
 */
export interface IRenderedView {
    /**
     * Sanitized HTML body.
     */
    html: string;

    /**
     * Title from the template frontmatter, if present.
     */
    title?: string;

    /**
     * Template that produced the HTML.
     */
    template: IViewTemplate;
}
