import { readFileSync } from 'node:fs';
import { z } from 'zod';

const keywordListSchema = z.object({
    keywords: z.array(z.string().min(1)).min(1)
});

/**
 * Keyword list shipped in `data/mobile-user-agents.json` at the package root.
 *
 * Sources and build output sit at the same depth below the package root, so
 * the relative URL resolves from both `src/` and `dist/`.
 */
const KEYWORD_FILE = new URL('../../../../data/mobile-user-agents.json', import.meta.url);

/**
 * Builds the case-insensitive pattern that flags mobile user agents.
 *
 * Each keyword is a regular-expression fragment (`up\.b`, `mot-`) matched
 * anywhere in the lowercased header.
 *
 * @param keywords - Keyword fragments joined as alternatives
 * @throws Error if the list is empty
 */
export function buildMobileUserAgentPattern(keywords: readonly string[]): RegExp {
    if (keywords.length === 0) {
        throw new Error('Mobile user agent keyword list is empty');
    }
    return new RegExp(keywords.join('|'));
}

function loadKeywords(): string[] {
    const raw: unknown = JSON.parse(readFileSync(KEYWORD_FILE, 'utf8'));
    return keywordListSchema.parse(raw).keywords;
}

export const MOBILE_USER_AGENT_PATTERN = buildMobileUserAgentPattern(loadKeywords());

/**
 * Tells whether a `User-Agent` header comes from a mobile device.
 *
 * A missing header is treated as an empty string and never matches.
 */
export function isMobileUserAgent(userAgent: string | undefined, pattern: RegExp = MOBILE_USER_AGENT_PATTERN): boolean {
    return pattern.test((userAgent ?? '').toLowerCase());
}
