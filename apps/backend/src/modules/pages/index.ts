export { PagesModule } from './PagesModule.js';
export type { IPagesModuleDependencies } from './PagesModule.js';
