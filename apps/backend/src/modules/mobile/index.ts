export { MobileModule } from './MobileModule.js';
export type { IMobileModuleDependencies } from './MobileModule.js';
export { MobileConfig, DEFAULT_MOBILE_OPTIONS } from './services/mobile-config.js';
export {
    MOBILE_FORMAT,
    forceMobileBySession,
    handleMobile,
    isMobileRequest,
    isMobileView,
    respondAsMobile,
    stopProcessingBecauseParam,
    stopProcessingBecauseXhr
} from './services/mobile-request.js';
export { MOBILE_USER_AGENT_PATTERN, buildMobileUserAgentPattern, isMobileUserAgent } from './services/user-agent.js';
export { CookieOverrideStore, OVERRIDE_COOKIE, isMobileOverride } from './services/override-store.js';
export type { IMobileOverrideStore } from './services/override-store.js';
export { createMobileMiddleware, collectSignals } from './api/mobile.middleware.js';
