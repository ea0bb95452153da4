import { describe, it, expect } from 'vitest';
import { http, HttpResponse } from 'msw';
import { InvalidArgumentError, MalformedResponseError } from '@freshsales-sdk/core';
import { SelectorClient } from '../freshsales/selector-client.js';
import { server, testFixtures, FRESHSALES_BASE_URL, TEST_API_KEY } from '../__mocks__/setup.js';

const selectors = () => new SelectorClient({ domain: 'acme', apiKey: TEST_API_KEY });

describe('SelectorClient', () => {
  it('should unwrap owners from users', async () => {
    await expect(selectors().owners()).resolves.toEqual(testFixtures.users);
  });

  it('should list deal stages', async () => {
    await expect(selectors().dealStages()).resolves.toEqual(testFixtures.dealStages);
  });

  it('should list currencies', async () => {
    await expect(selectors().currencies()).resolves.toEqual(testFixtures.currencies);
  });

  it('should list the stages of one pipeline', async () => {
    await expect(selectors().dealPipelineStages(5)).resolves.toEqual(testFixtures.pipelineStages);
  });

  it('should list the outcomes of one activity type', async () => {
    await expect(selectors().salesActivityOutcomes(6)).resolves.toEqual(
      testFixtures.activityOutcomes
    );
  });

  it.each([
    ['dealReasons', 'deal_reasons'],
    ['dealTypes', 'deal_types'],
    ['dealPipelines', 'deal_pipelines'],
    ['salesActivityTypes', 'sales_activity_types'],
  ] as const)('should read %s from /selector/%s', async (accessor, name) => {
    const items = [{ id: 1, name: `${name} item` }];
    server.use(
      http.get(`${FRESHSALES_BASE_URL}/selector/${name}`, () => HttpResponse.json({ [name]: items }))
    );

    await expect(selectors()[accessor]()).resolves.toEqual(items);
  });

  it('should return the raw body from fetch', async () => {
    await expect(selectors().fetch('currencies')).resolves.toEqual({
      currencies: testFixtures.currencies,
    });
  });

  it('should raise MalformedResponseError when the key is absent', async () => {
    server.use(
      http.get(`${FRESHSALES_BASE_URL}/selector/owners`, () => HttpResponse.json({ owners: [] }))
    );

    await expect(selectors().owners()).rejects.toThrow(MalformedResponseError);
  });

  it.each(['../contacts', 'owners?x=1', ''])('should refuse selector name %j', async (name) => {
    await expect(selectors().fetch(name)).rejects.toThrow(InvalidArgumentError);
  });

  it('should refuse a pipeline id that is not a path segment', async () => {
    await expect(selectors().dealPipelineStages('1/2')).rejects.toThrow(InvalidArgumentError);
  });
});
