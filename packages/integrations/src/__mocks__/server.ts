import { setupServer } from 'msw/node';
import { handlers } from './handlers.js';

/**
 * In-process Freshsales API for tests.
 * Started and reset by vitest.setup.ts.
 */
export const server = setupServer(...handlers);
