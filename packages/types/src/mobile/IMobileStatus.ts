import type { MobileOverride } from './MobileOverride.js';

/**
 * Mobile state of the current request as reported by `GET /api/mobile/status`.
 */
export interface IMobileStatus {
    format: string;
    isMobileRequest: boolean;
    isMobileView: boolean;
    override: MobileOverride | null;
}
