/**
 * App-level behaviour: health, request ids, 404 and the error handler
 */

import { describe, it, expect } from 'vitest';
import { createTestApp, makeRequest } from '../test/helpers.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('App', () => {
  it('should report health', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', version: '0.1.0' });
  });

  it('should echo a caller-supplied request id', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/v1/health', {
      headers: { 'x-request-id': 'req-123' },
    });

    expect(response.headers.get('x-request-id')).toBe('req-123');
  });

  it('should replace a malformed request id with a generated one', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/health', {
      headers: { 'x-request-id': 'not a valid id' },
    });

    expect(response.headers.get('x-request-id')).toMatch(UUID);
  });

  it('should return JSON for unknown routes', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/v1/nope');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should turn unexpected errors into 500 responses', async () => {
    // No scripted reply: the extractor throws
    const { app } = createTestApp();

    const response = await makeRequest(app, 'POST', '/v1/entries', { body: { text: 'coffee 40' } });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
    expect(response.headers.get('x-request-id')).toMatch(UUID);
  });
});
