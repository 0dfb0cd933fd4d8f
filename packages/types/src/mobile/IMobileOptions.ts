/**
 * Per-router mobile configuration.
 *
 * Created with defaults when a router opts into mobile handling and adjusted
 * once at setup time. Request handling only ever reads it.
 */
export interface IMobileOptions {
    /**
     * Format rendered when no mobile template exists for a view.
     *
     * `false` disables the fallback, so a missing mobile template is an error.
     *
     * @default 'html'
     */
    fallBack: string | false;

    /**
     * Whether ajax requests (`X-Requested-With: XMLHttpRequest`) bypass mobile
     * detection. Disable it for client frameworks that load whole pages over ajax.
     *
     * @default true
     */
    skipXhrRequests: boolean;
}
