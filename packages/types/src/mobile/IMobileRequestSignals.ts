import type { MobileOverride } from './MobileOverride.js';

/**
 * Everything the mobile decision reads from a request.
 *
 * Collected once per request by the middleware so the decision functions stay
 * free of Express types.
 */
export interface IMobileRequestSignals {
    /**
     * Raw `User-Agent` header, if any.
     */
    userAgent?: string;

    /**
     * True for ajax requests.
     */
    xhr: boolean;

    /**
     * Explicit `format` query parameter.
     */
    formatParam?: string;

    /**
     * Raw `skip_mobile` query parameter. Only the string `'true'` skips.
     */
    skipMobileParam?: string;

    /**
     * Format already negotiated for the request.
     */
    requestFormat?: string;

    override?: MobileOverride;
}

/**
 * Outcome of the request hook.
 *
 * - `skip`: the session asked to ignore mobile handling
 * - `mobile`: the request format becomes `mobile`
 * - `unchanged`: nothing to do
 */
export type MobileDecision = 'skip' | 'mobile' | 'unchanged';
