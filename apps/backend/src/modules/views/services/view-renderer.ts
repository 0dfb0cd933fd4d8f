import type { ILogger, IRenderedView, IViewResolver } from '@handheld/types';
import { MissingTemplateError } from '../../../lib/errors.js';
import type { MarkdownService } from './markdown.service.js';

/**
 * Renders named views in a requested format.
 *
 * The view paths decide which template answers a (name, format) pair; for
 * mobile requests they include the fallback resolver of the router's mobile
 * configuration.
 */
export class ViewRenderer {
    constructor(
        private readonly markdown: MarkdownService,
        private readonly logger: ILogger
    ) {}

    /**
     * @throws MissingTemplateError when no view path has a template, fallback included
     */
    async render(name: string, format: string, paths: IViewResolver): Promise<IRenderedView> {
        const template = await paths.find(name, format);

        if (!template) {
            throw new MissingTemplateError(name, format);
        }

        if (template.format !== format) {
            this.logger.debug({ view: name, requested: format, rendered: template.format }, 'Rendering fallback template');
        }

        const { frontmatter, body } = this.markdown.parseMarkdown(template.source);
        const html = await this.markdown.renderMarkdown(body);

        return { html, title: frontmatter.title, template };
    }
}
