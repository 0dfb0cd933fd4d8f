export type { IRenderedView } from './IRenderedView.js';
export type { IViewResolver } from './IViewResolver.js';
export type { IViewTemplate } from './IViewTemplate.js';
