/**
 * Session-scoped override of mobile handling.
 *
 * - `force_mobile` treats every request of the session as mobile, whatever
 *   the user agent says (a "view mobile site" link).
 * - `ignore_mobile` leaves the request untouched (a "view full site" link).
 *
 * An unset override is represented by `undefined`.
 */
export type MobileOverride = 'force_mobile' | 'ignore_mobile';
