import type { CookieOptions, Request, Response } from 'express';
import type { MobileOverride } from '@handheld/types';

/**
 * Where the session keeps its mobile override.
 */
export interface IMobileOverrideStore {
    read(req: Request): MobileOverride | undefined;
    write(res: Response, override: MobileOverride): void;
    clear(res: Response): void;
}

export const MOBILE_OVERRIDES: readonly MobileOverride[] = ['force_mobile', 'ignore_mobile'];

export const OVERRIDE_COOKIE = 'handheld_mobile_override';

const DEFAULT_COOKIE_OPTIONS: CookieOptions = {
    httpOnly: true,
    sameSite: 'lax',
    path: '/'
};

export function isMobileOverride(value: unknown): value is MobileOverride {
    return typeof value === 'string' && MOBILE_OVERRIDES.some(override => override === value);
}

/**
 * Keeps the override in a signed session cookie.
 *
 * Requires cookie-parser mounted with a secret. Tampered cookies come back
 * from cookie-parser as `false` and read as unset, like unknown values.
 */
export class CookieOverrideStore implements IMobileOverrideStore {
    private readonly options: CookieOptions;

    /**
     * @param options - Extra cookie options, e.g. `{ secure: true }` in production
     */
    constructor(options: CookieOptions = {}) {
        this.options = { ...DEFAULT_COOKIE_OPTIONS, ...options, signed: true };
    }

    read(req: Request): MobileOverride | undefined {
        const signed: unknown = req.signedCookies;
        if (typeof signed !== 'object' || signed === null) {
            return undefined;
        }

        const value: unknown = Reflect.get(signed, OVERRIDE_COOKIE);
        return isMobileOverride(value) ? value : undefined;
    }

    write(res: Response, override: MobileOverride): void {
        res.cookie(OVERRIDE_COOKIE, override, this.options);
    }

    clear(res: Response): void {
        const { httpOnly, sameSite, path, secure, domain } = this.options;
        res.clearCookie(OVERRIDE_COOKIE, { httpOnly, sameSite, path, secure, domain });
    }
}
