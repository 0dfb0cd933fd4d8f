import { Router } from 'express';
import type { RequestHandler } from 'express';
import type { MobileController } from './mobile.controller.js';

/**
 * Create the mobile override routes.
 *
 * @param controller - Mobile controller instance
 * @param mobileMiddleware - Request hook whose decision `/status` reports
 * @returns Express router mounted at /api/mobile
 */
export function createMobileRouter(controller: MobileController, mobileMiddleware: RequestHandler): Router {
    const router = Router();

    router.use(mobileMiddleware);

    // GET /api/mobile/status - Mobile decision for this request
    router.get('/status', controller.getStatus.bind(controller));

    // PUT /api/mobile/override - Force or ignore mobile handling for the session
    router.put('/override', controller.setOverride.bind(controller));

    // DELETE /api/mobile/override - Back to user agent detection
    router.delete('/override', controller.clearOverride.bind(controller));

    return router;
}
