import matter from 'gray-matter';
import { remark } from 'remark';
import remarkGfm from 'remark-gfm';
import remarkHtml from 'remark-html';
import { rehype } from 'rehype';
import rehypeSanitize from 'rehype-sanitize';
import rehypeStringify from 'rehype-stringify';

/**
 * Frontmatter fields a view template may declare.
 */
export interface IViewFrontmatter {
    title?: string;
}

export interface IParsedTemplate {
    frontmatter: IViewFrontmatter;
    body: string;
}

/**
 * Turns markdown view templates into sanitized HTML.
 *
 * The remark/rehype pipeline:
 * 1. Parse markdown with GitHub Flavored Markdown support
 * 2. Convert to HTML
 * 3. Sanitize HTML to prevent XSS attacks
 * 4. Stringify to final HTML output
 */
export class MarkdownService {
    /**
     * Split a template into its YAML frontmatter and markdown body.
     *
     * ```
     * ---
     * title: "Welcome"
     * ---
     * # Welcome
     * ```
     *
     * @throws Error if the frontmatter is not valid YAML
     */
    parseMarkdown(content: string): IParsedTemplate {
        try {
            const { data, content: body } = matter(content);
            const title: unknown = data.title;

            return {
                frontmatter: {
                    title: typeof title === 'string' ? title : undefined
                },
                body
            };
        } catch (error) {
            throw new Error(
                `Failed to parse frontmatter: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    /**
     * Render a markdown body to sanitized HTML.
     *
     * @example
     * const html = await markdown.renderMarkdown("# Hello\n\nThis is **bold** text.");
     * // "<h1>Hello</h1>\n<p>This is <strong>bold</strong> text.</p>"
     *
     * @throws Error if markdown processing fails
     */
    async renderMarkdown(markdown: string): Promise<string> {
        try {
            const htmlResult = await remark()
                .use(remarkGfm)
                .use(remarkHtml, { sanitize: false }) // sanitized by rehype below
                .process(markdown);

            const sanitizedResult = await rehype()
                .use(rehypeSanitize) // also unwraps the html/body shell rehype adds
                .use(rehypeStringify)
                .process(String(htmlResult));

            return String(sanitizedResult);
        } catch (error) {
            throw new Error(
                `Failed to render markdown: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }
}
