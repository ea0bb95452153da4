import { http, HttpResponse } from 'msw';

/**
 * MSW Handlers for the Freshsales API
 * Account `acme`, authenticated with the placeholder key `test-secret`
 */

export const FRESHSALES_BASE_URL = 'https://acme.freshsales.io/api';
export const TEST_API_KEY = 'test-secret';

// =============================================================================
// Test Fixtures
// =============================================================================

export const testFixtures = {
  users: [
    { id: 7, display_name: 'Ana Owner', email: 'ana@example.com' },
    { id: 8, display_name: 'Ben Owner', email: 'ben@example.com' },
  ],
  contactStatuses: [
    { id: 3, name: 'New' },
    { id: 4, name: 'Contacted' },
  ],
  appointments: [
    { id: 1, title: 'Demo call', outcome_id: 9 },
    { id: 2, title: 'Follow-up', outcome_id: null },
  ],
  outcomes: [{ id: 9, name: 'Won' }],
  views: [
    { id: 1, name: 'All Contacts' },
    { id: 2, name: 'My Contacts' },
  ],
  contact: {
    id: 101,
    first_name: 'Test',
    last_name: 'Contact',
    owner_id: 7,
    contact_status_id: 3,
    appointment_ids: [1],
  },
  dealStages: [
    { id: 20, name: 'New', position: 1 },
    { id: 21, name: 'Won', position: 2 },
  ],
  pipelineStages: [{ id: 30, name: 'Qualified', deal_pipeline_id: 5 }],
  activityOutcomes: [{ id: 40, name: 'Interested', sales_activity_type_id: 6 }],
  currencies: [{ id: 1, currency_code: 'USD', is_default: true }],
};

/** Records per page of the paged contacts view */
export const PAGE_SIZE = 3;
/** Pages in the paged contacts view */
export const TOTAL_PAGES = 3;
/** Saved view with three full pages */
export const PAGED_VIEW_ID = 1;
/** Saved view with no records */
export const EMPTY_VIEW_ID = 2;

/**
 * One page of the paged contacts view: ids 101.. in order, three per page
 */
export function contactsPage(page: number, totalPages = TOTAL_PAGES) {
  const contacts = Array.from({ length: PAGE_SIZE }, (_, i) => {
    const id = 100 + (page - 1) * PAGE_SIZE + i + 1;
    return { id, owner_id: id % 2 === 0 ? 8 : 7 };
  });
  return {
    contacts,
    users: testFixtures.users,
    meta: { total_pages: totalPages, total: totalPages * PAGE_SIZE },
  };
}

// =============================================================================
// Freshsales API Mocks
// =============================================================================

function isAuthorized(request: Request): boolean {
  return request.headers.get('Authorization') === `Token token=${TEST_API_KEY}`;
}

function unauthorized() {
  return HttpResponse.json({ login: 'failed', message: 'Incorrect or expired API key' }, { status: 401 });
}

function notFound() {
  return HttpResponse.json({ errors: { code: 404, message: ['Record not found'] } }, { status: 404 });
}

async function readObject(request: Request): Promise<Record<string, unknown>> {
  const body: unknown = await request.json();
  return typeof body === 'object' && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
}

const contactHandlers = [
  http.get(`${FRESHSALES_BASE_URL}/contacts/filters`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ filters: testFixtures.views });
  }),

  http.get(`${FRESHSALES_BASE_URL}/contacts/view/:viewId`, ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();
    const page = Number(new URL(request.url).searchParams.get('page') ?? '1');

    if (params.viewId === String(EMPTY_VIEW_ID)) {
      return HttpResponse.json({ contacts: [], meta: { total_pages: 0, total: 0 } });
    }
    if (params.viewId !== String(PAGED_VIEW_ID) || page < 1 || page > TOTAL_PAGES) {
      return notFound();
    }
    return HttpResponse.json(contactsPage(page));
  }),

  http.get(`${FRESHSALES_BASE_URL}/contacts/:contactId/activities`, ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({
      activities: [{ id: 900, action_type: 'CREATE', targetable_id: Number(params.contactId) }],
    });
  }),

  http.get(`${FRESHSALES_BASE_URL}/contacts/:contactId/appointments`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ appointments: testFixtures.appointments });
  }),

  http.get(`${FRESHSALES_BASE_URL}/contacts/:contactId`, ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();
    if (params.contactId !== String(testFixtures.contact.id)) return notFound();
    return HttpResponse.json({
      contact: testFixtures.contact,
      users: testFixtures.users,
      contact_status: testFixtures.contactStatuses,
      appointments: testFixtures.appointments,
      outcomes: testFixtures.outcomes,
    });
  }),

  http.post(`${FRESHSALES_BASE_URL}/contacts/bulk_destroy`, async ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    const body = await readObject(request);
    return HttpResponse.json({ message: 'Your contacts are being deleted', received: body });
  }),

  http.post(`${FRESHSALES_BASE_URL}/contacts`, async ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    const body = await readObject(request);
    return HttpResponse.json({ contact: { id: 500, ...readObjectField(body, 'contact') } });
  }),

  http.put(`${FRESHSALES_BASE_URL}/contacts/:contactId`, async ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();
    const body = await readObject(request);
    return HttpResponse.json({
      contact: { id: Number(params.contactId), ...readObjectField(body, 'contact') },
    });
  }),

  http.delete(`${FRESHSALES_BASE_URL}/contacts/:contactId/forget`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ success: true });
  }),

  http.delete(`${FRESHSALES_BASE_URL}/contacts/:contactId`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json(true);
  }),
];

const selectorHandlers = [
  http.get(`${FRESHSALES_BASE_URL}/selector/owners`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ users: testFixtures.users });
  }),

  http.get(`${FRESHSALES_BASE_URL}/selector/deal_stages`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ deal_stages: testFixtures.dealStages });
  }),

  http.get(`${FRESHSALES_BASE_URL}/selector/currencies`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ currencies: testFixtures.currencies });
  }),

  http.get(
    `${FRESHSALES_BASE_URL}/selector/deal_pipelines/:pipelineId/deal_stages`,
    ({ request }) => {
      if (!isAuthorized(request)) return unauthorized();
      return HttpResponse.json({ deal_stages: testFixtures.pipelineStages });
    }
  ),

  http.get(
    `${FRESHSALES_BASE_URL}/selector/sales_activity_types/:typeId/sales_activity_outcomes`,
    ({ request }) => {
      if (!isAuthorized(request)) return unauthorized();
      return HttpResponse.json({ sales_activity_outcomes: testFixtures.activityOutcomes });
    }
  ),
];

function readObjectField(body: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = body[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

// =============================================================================
// Handler Factories
// =============================================================================

/**
 * Creates a handler that always answers with the given status
 */
export function createFailingHandler(
  url: string,
  method: 'get' | 'post' | 'put' | 'delete' = 'get',
  errorStatus = 500,
  body = '{"errors":{"code":500,"message":["Internal error"]}}'
) {
  return http[method](url, () => new HttpResponse(body, { status: errorStatus }));
}

/**
 * Creates a handler that counts calls before delegating to `respond`
 */
export function createCountingHandler(
  url: string,
  respond: (request: Request) => Response | Promise<Response>
) {
  const calls: string[] = [];
  const handler = http.get(url, ({ request }) => {
    calls.push(request.url);
    return respond(request);
  });
  return { handler, calls };
}

export const handlers = [...contactHandlers, ...selectorHandlers];
