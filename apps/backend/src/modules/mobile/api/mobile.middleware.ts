import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ILogger, IMobileRequestSignals, MobileOverride } from '@handheld/types';
import { queryString } from '../../../api/middleware/negotiate-format.js';
import type { MobileConfig } from '../services/mobile-config.js';
import { handleMobile, isMobileRequest, isMobileView, MOBILE_FORMAT } from '../services/mobile-request.js';
import type { IMobileOverrideStore } from '../services/override-store.js';

export interface IMobileMiddlewareDependencies {
    config: MobileConfig;
    overrideStore: IMobileOverrideStore;
    logger: ILogger;
}

/**
 * Reads the mobile decision inputs off an Express request.
 */
export function collectSignals(req: Request, override: MobileOverride | undefined): IMobileRequestSignals {
    return {
        userAgent: req.get('user-agent'),
        xhr: req.xhr,
        formatParam: queryString(req, 'format'),
        skipMobileParam: queryString(req, 'skip_mobile'),
        requestFormat: req.format,
        override
    };
}

/**
 * Request hook that switches mobile requests to the `mobile` format.
 *
 * Must run after format negotiation and before any handler that renders a
 * view. Besides rewriting `req.format` it publishes the view helpers
 * `res.locals.isMobileRequest` and `res.locals.isMobileView`, and marks the
 * response as varying by user agent.
 */
export function createMobileMiddleware({ config, overrideStore, logger }: IMobileMiddlewareDependencies): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        config.seal();
        const options = config.current;

        const override = overrideStore.read(req);
        const signals = collectSignals(req, override);
        const decision = handleMobile(signals, options);

        if (decision === 'mobile') {
            req.format = MOBILE_FORMAT;
            logger.debug({ requestId: req.id, path: req.path, override }, 'Responding as mobile');
        }

        res.locals.isMobileRequest = isMobileRequest(signals);
        res.locals.isMobileView = isMobileView({ ...signals, requestFormat: req.format });
        res.locals.mobileOverride = override;
        res.locals.mobileFallBack = options.fallBack;
        res.vary('User-Agent');

        next();
    };
}
