/**
 * Route tests for GET/POST /v1/categories
 */

import { describe, it, expect } from 'vitest';
import { CategoriesResponseSchema, LogEntryResponseSchema } from '@tally/types';
import { createTestApp, makeRequest } from '../../../test/helpers.js';

describe('GET /v1/categories', () => {
  it('should return the default taxonomy', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/v1/categories');

    expect(response.status).toBe(200);
    const data = CategoriesResponseSchema.parse(await response.json());
    expect(data.version).toBe(1);
    expect(data.labels).toHaveLength(13);
    expect(data.labels[12]).toBe('Uncategorized');
    expect(data.synonyms['Baby Care']).toContain('diapers');
  });
});

describe('POST /v1/categories', () => {
  it('should extend the taxonomy used for later entries', async () => {
    const { app, extractor } = createTestApp();

    const response = await makeRequest(app, 'POST', '/v1/categories', {
      body: { labels: ['Pets'], synonyms: { Pets: ['vet', 'dog food'] } },
    });

    expect(response.status).toBe(200);
    const data = CategoriesResponseSchema.parse(await response.json());
    expect(data.version).toBe(2);
    expect(data.labels.slice(-2)).toEqual(['Pets', 'Uncategorized']);
    expect(data.synonyms.Pets).toEqual(['vet', 'dog food']);

    extractor.reply({
      ok: true,
      candidate: { amount: 800, description: 'Checkup', category: 'Vet', type: 'expense' },
    });
    const entry = await makeRequest(app, 'POST', '/v1/entries', { body: { text: 'vet 800' } });
    const entryData = LogEntryResponseSchema.parse(await entry.json());
    expect(entryData.entry.category).toBe('Pets');
  });

  it('should return 409 when a synonym already belongs to another label', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'POST', '/v1/categories', {
      body: { synonyms: { Rent: ['salary'] } },
    });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: '"salary" already resolves to Income and cannot be remapped to Rent',
    });
  });

  it('should return 400 for synonyms of an unknown label', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'POST', '/v1/categories', {
      body: { synonyms: { Travel: ['flight'] } },
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Synonyms reference an unknown category label: Travel',
    });
  });

  it('should return 400 for an empty body', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'POST', '/v1/categories', { body: {} });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'Validation failed' });
  });
});
