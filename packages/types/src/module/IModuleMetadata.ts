/**
 * Identifying information about a backend module, used for logging and
 * error attribution during bootstrap.
 */
export interface IModuleMetadata {
    /**
     * Lowercase kebab-case identifier matching the module directory name.
     *
     * @example 'mobile', 'pages'
     */
    id: string;

    /**
     * Human-readable module name.
     */
    name: string;

    /**
     * Semantic version string.
     */
    version: string;

    description?: string;
}
