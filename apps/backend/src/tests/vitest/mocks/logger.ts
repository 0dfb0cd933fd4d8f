import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ILogger } from '@handheld/types';

export interface IMockLogger extends ILogger {
    fatal: Mock;
    error: Mock;
    warn: Mock;
    info: Mock;
    debug: Mock;
    trace: Mock;
}

/**
 * Logger whose methods are spies. Children share the parent's spies so
 * assertions see entries logged through scoped loggers too.
 */
export function createMockLogger(): IMockLogger {
    const mockLogger: IMockLogger = {
        fatal: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        trace: vi.fn(),
        child: () => mockLogger
    };
    return mockLogger;
}
