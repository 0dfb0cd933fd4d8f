export { FileSystemViewResolver, TEMPLATE_EXTENSION } from './services/file-system-view.resolver.js';
export { FallbackViewResolver } from './services/fallback-view.resolver.js';
export { ViewPathSet } from './services/view-path-set.js';
export { MarkdownService } from './services/markdown.service.js';
export type { IParsedTemplate, IViewFrontmatter } from './services/markdown.service.js';
export { ViewRenderer } from './services/view-renderer.js';
export { renderView, renderDocument, DEFAULT_FORMAT } from './api/render-view.js';
