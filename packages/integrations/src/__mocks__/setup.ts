/**
 * MSW Test Utilities
 *
 * Re-exports the MSW server and Freshsales fixtures for use in tests.
 * Lifecycle management (beforeAll/afterEach/afterAll) is handled by vitest.setup.ts.
 *
 * Per-test handler overrides:
 * ```typescript
 * server.use(
 *   http.get(`${FRESHSALES_BASE_URL}/deals/filters`, () => {
 *     return HttpResponse.json({ filters: [] });
 *   })
 * );
 * ```
 */

export { server } from './server.js';
export {
  handlers,
  testFixtures,
  contactsPage,
  createFailingHandler,
  createCountingHandler,
  FRESHSALES_BASE_URL,
  TEST_API_KEY,
  PAGED_VIEW_ID,
  EMPTY_VIEW_ID,
} from './handlers.js';
