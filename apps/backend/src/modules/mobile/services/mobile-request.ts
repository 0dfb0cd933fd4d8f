import type { IMobileOptions, IMobileRequestSignals, MobileDecision } from '@handheld/types';
import { isMobileUserAgent } from './user-agent.js';

/**
 * Format that mobile requests are rewritten to.
 */
export const MOBILE_FORMAT = 'mobile';

/**
 * Whether the request carries a mobile user agent.
 */
export function isMobileRequest(signals: IMobileRequestSignals): boolean {
    return isMobileUserAgent(signals.userAgent);
}

/**
 * Whether the view being rendered is the mobile one, either because the
 * client asked for it explicitly or because the format was already rewritten.
 */
export function isMobileView(signals: IMobileRequestSignals): boolean {
    return signals.formatParam === MOBILE_FORMAT || signals.requestFormat === MOBILE_FORMAT;
}

export function forceMobileBySession(signals: IMobileRequestSignals): boolean {
    return signals.override === 'force_mobile';
}

/**
 * `?skip_mobile=true` keeps a single request on the regular format.
 */
export function stopProcessingBecauseParam(signals: IMobileRequestSignals): boolean {
    return signals.skipMobileParam === 'true';
}

/**
 * Ajax requests stay untouched unless the router turned `skipXhrRequests` off.
 */
export function stopProcessingBecauseXhr(signals: IMobileRequestSignals, options: IMobileOptions): boolean {
    return signals.xhr && options.skipXhrRequests;
}

/**
 * Whether the request is to be answered with the mobile format.
 *
 * Impediments (ajax, `skip_mobile`) win over every reason to go mobile: a
 * session force, a mobile user agent, or an explicit `format=mobile`.
 */
export function respondAsMobile(signals: IMobileRequestSignals, options: IMobileOptions): boolean {
    const impediments = stopProcessingBecauseXhr(signals, options) || stopProcessingBecauseParam(signals);
    if (impediments) {
        return false;
    }
    return forceMobileBySession(signals) || isMobileRequest(signals) || signals.formatParam === MOBILE_FORMAT;
}

/**
 * Decides what the request hook does with a request.
 *
 * A session `ignore_mobile` override short-circuits before any other signal
 * is looked at.
 */
export function handleMobile(signals: IMobileRequestSignals, options: IMobileOptions): MobileDecision {
    if (signals.override === 'ignore_mobile') {
        return 'skip';
    }
    return respondAsMobile(signals, options) ? 'mobile' : 'unchanged';
}
