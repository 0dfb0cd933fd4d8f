import type { MobileOverride } from '@handheld/types';

declare global {
    namespace Express {
        interface Request {
            /**
             * Request id, taken from `x-request-id` or generated.
             */
            id?: string;

            /**
             * Negotiated response format (`html`, `mobile`, `json`).
             */
            format?: string;
        }

        interface Locals {
            isMobileRequest?: boolean;
            isMobileView?: boolean;
            mobileOverride?: MobileOverride;
            mobileFallBack?: string | false;
        }
    }
}

export {};
