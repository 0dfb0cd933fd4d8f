import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { ILogger, IMobileStatus } from '@handheld/types';
import { ValidationError } from '../../../lib/errors.js';
import type { IMobileOverrideStore } from '../services/override-store.js';

export const overrideBodySchema = z.object({
    mode: z.enum(['force_mobile', 'ignore_mobile'])
});

/**
 * HTTP controller for the session's mobile override.
 *
 * Routes are mounted behind the mobile middleware so status reflects the
 * decision taken for the very request asking.
 */
export class MobileController {
    constructor(
        private readonly overrideStore: IMobileOverrideStore,
        private readonly logger: ILogger
    ) {}

    /**
     * GET /api/mobile/status
     */
    getStatus(req: Request, res: Response): void {
        const status: IMobileStatus = {
            format: req.format ?? 'html',
            isMobileRequest: res.locals.isMobileRequest ?? false,
            isMobileView: res.locals.isMobileView ?? false,
            override: res.locals.mobileOverride ?? null
        };
        res.json(status);
    }

    /**
     * PUT /api/mobile/override
     * Body: `{ "mode": "force_mobile" | "ignore_mobile" }`
     *
     * @throws ValidationError for any other body
     */
    setOverride(req: Request, res: Response): void {
        const parsed = overrideBodySchema.safeParse(req.body);
        if (!parsed.success) {
            throw new ValidationError('Invalid request body', parsed.error.flatten());
        }

        this.overrideStore.write(res, parsed.data.mode);
        this.logger.info({ requestId: req.id, override: parsed.data.mode }, 'Mobile override set');
        res.status(StatusCodes.NO_CONTENT).end();
    }

    /**
     * DELETE /api/mobile/override
     */
    clearOverride(req: Request, res: Response): void {
        this.overrideStore.clear(res);
        this.logger.info({ requestId: req.id }, 'Mobile override cleared');
        res.status(StatusCodes.NO_CONTENT).end();
    }
}
