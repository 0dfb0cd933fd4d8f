/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { buildMobileUserAgentPattern, isMobileUserAgent, MOBILE_USER_AGENT_PATTERN } from '../services/user-agent.js';

const IPHONE = 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1';
const ANDROID = 'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Mobile Safari/537.36';
const WINDOWS_DESKTOP = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const MAC_DESKTOP = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15';

describe('isMobileUserAgent', () => {
    it('should match phone user agents', () => {
        expect(isMobileUserAgent(IPHONE)).toBe(true);
        expect(isMobileUserAgent(ANDROID)).toBe(true);
    });

    it('should not match desktop browsers', () => {
        expect(isMobileUserAgent(WINDOWS_DESKTOP)).toBe(false);
        expect(isMobileUserAgent(MAC_DESKTOP)).toBe(false);
    });

    it('should ignore case', () => {
        expect(isMobileUserAgent('NOKIA6300/2.0')).toBe(true);
        expect(isMobileUserAgent('Opera/9.80 (J2ME/MIDP; Opera Mini/9.80)')).toBe(true);
    });

    it('should treat missing or empty headers as non-mobile', () => {
        expect(isMobileUserAgent(undefined)).toBe(false);
        expect(isMobileUserAgent('')).toBe(false);
    });

    it('should keep keywords as pattern fragments', () => {
        expect(MOBILE_USER_AGENT_PATTERN.test('up.browser/6.2')).toBe(true);
        expect(MOBILE_USER_AGENT_PATTERN.test('upxbrowser')).toBe(false);
    });

    it('should accept a custom pattern', () => {
        const pattern = buildMobileUserAgentPattern(['kindle', 'silk']);

        expect(isMobileUserAgent('Mozilla/5.0 (Linux; U; en-US) Kindle/3.0', pattern)).toBe(true);
        expect(isMobileUserAgent(IPHONE, pattern)).toBe(false);
    });

    it('should reject an empty keyword list', () => {
        expect(() => buildMobileUserAgentPattern([])).toThrow('Mobile user agent keyword list is empty');
    });
});
