import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import type http from 'node:http';
import os from 'node:os';
import path from 'node:path';

import { startServer } from '../server';
import { JsonErrorRepository } from '../../errors/jsonErrorRepository';
import { THEME_CSS } from '../../embed/styles/theme';
import { renderReviewPage } from '../../embed/templates/reviewPage';
import type { AppServices } from '../services';
import type { GpuStatusProvider } from '../../gpu/gpuStatus';
import type { ModelSource } from '../../models/ollamaClient';

const API_KEY = 'test-secret';

const ENTITIES: Record<string, string> = { '&amp;': '&', '&lt;': '<', '&gt;': '>', '&quot;': '"', '&#39;': "'" };

/** Name/value pairs of the hidden inputs in a rendered page, unescaped. */
function hiddenFields(html: string): URLSearchParams {
  const params = new URLSearchParams();
  for (const match of html.matchAll(/<input type="hidden" name="([^"]+)" value="([^"]*)">/g)) {
    params.append(match[1], match[2].replace(/&(amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity));
  }
  return params;
}

const gpuProvider: GpuStatusProvider = {
  async getSnapshot() {
    return {
      available: true,
      collectedAt: '2026-01-01T00:00:00.000Z',
      gpus: [
        {
          index: 0,
          name: 'Test GPU',
          utilizationPercent: 75,
          memoryUsedMiB: 1024,
          memoryTotalMiB: 8192,
          temperatureC: 50,
          powerDrawW: 80,
        },
      ],
    };
  },
};

const modelSource: ModelSource = {
  async getModelOverview() {
    return {
      connected: true,
      message: 'Connected, 1 model(s) pulled',
      models: [{ id: 'llama3:8b', name: 'Llama 3 8B', description: 'General', pulled: true }],
    };
  },
};

describe('HTTP server', () => {
  let dir: string;
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dashboard-server-'));
    const buildErrorsPath = path.join(dir, 'build_errors.json');
    const checkstyleErrorsPath = path.join(dir, 'checkstyle_error.json');
    await fs.writeFile(
      buildErrorsPath,
      JSON.stringify({
        CompileTimeErrors: [{ error_name: 'Missing semicolon', description: 'Statement not terminated' }],
        LogicalErrors: [{ error_name: 'Off-by-one error', description: 'Loop runs once too often' }],
      }),
      'utf8',
    );
    await fs.writeFile(
      checkstyleErrorsPath,
      JSON.stringify({ NamingConventionChecks: [{ check_name: 'MemberName', description: 'Field names must be camelCase' }] }),
      'utf8',
    );

    const services: AppServices = {
      errorRepository: new JsonErrorRepository({ buildErrorsPath, checkstyleErrorsPath, random: () => 0 }),
      gpuProvider,
      modelSource,
      settings: {
        apiKey: API_KEY,
        defaultTheme: 'light',
        thresholds: {
          utilization: { warning: 70, critical: 90 },
          temperature: { warning: 75, critical: 85 },
          memory: { warning: 80, critical: 95 },
        },
        roles: { generative: 'llama3:8b', review: 'llama3:8b', summary: 'llama3:8b', compare: 'phi3' },
      },
    };

    server = await startServer(services, 0);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(dir, { recursive: true, force: true });
  });

  function get(route: string, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${route}`, { headers });
  }

  function post(route: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('answers unknown routes with a JSON 404', async () => {
    const res = await get('/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('answers preflight requests', async () => {
    const res = await fetch(`${baseUrl}/api/v1/gpu`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
  });

  it('serves the style sheet', async () => {
    const res = await get('/theme.css');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/css; charset=utf-8');
    expect(await res.text()).toBe(THEME_CSS);
  });

  describe('dashboard', () => {
    it('renders in the default theme', async () => {
      const res = await get('/');
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
      const html = await res.text();
      expect(html).toContain('<html lang="en" data-theme="light">');
      expect(html).toContain('<div class="gpu-metric-card gpu-warning">');
      expect(html).toContain('<div class="model-card available">');
    });

    it('honors the theme query parameter', async () => {
      expect(await (await get('/?theme=dark')).text()).toContain('<html lang="en" data-theme="dark">');
      expect(await (await get('/?theme=neon')).text()).toContain('<html lang="en" data-theme="light">');
    });
  });

  describe('error selector page', () => {
    it('maps focus areas to catalog categories in standard mode', async () => {
      const html = await (await get('/errors?area=Style&area=Unknown')).text();
      expect(html).toContain('<input type="radio" name="mode" value="standard" checked>');
      expect(html).toContain('<label class="problem-area-card selected" id="card-style">');
      expect(html).toContain('<span class="error-category">NamingConventionChecks</span>');
      expect(html).not.toContain('WhitespaceAndFormattingChecks');
      expect(html).toContain(
        '<ol class="known-problems"><li>Checkstyle Error - MemberName: Field names must be camelCase (Category: NamingConventionChecks)</li></ol>',
      );
    });

    it('selects explicit categories in advanced mode', async () => {
      const html = await (await get('/errors?mode=advanced&build=LogicalErrors&build=Bogus&area=Style')).text();
      expect(html).toContain('<input type="checkbox" name="build" value="LogicalErrors" checked> LogicalErrors');
      expect(html).toContain('<input type="checkbox" name="checkstyle" value="NamingConventionChecks"> NamingConventionChecks');
      expect(html).not.toContain('id="card-style"');
      expect(html).toContain(
        '<ol class="known-problems"><li>Build Error - Off-by-one error: Loop runs once too often (Category: LogicalErrors)</li></ol>',
      );
    });

    it('adds and removes specific errors', async () => {
      const added = new URLSearchParams([
        ['mode', 'specific'],
        ['specific', 'build:CompileTimeErrors:Missing semicolon'],
        ['add', 'build:LogicalErrors:Off-by-one error'],
      ]);
      const html = await (await get(`/errors?${added}`)).text();
      expect(html).toContain('<input type="hidden" name="specific" value="build:CompileTimeErrors:Missing semicolon">');
      expect(html).toContain('<input type="hidden" name="specific" value="build:LogicalErrors:Off-by-one error">');
      expect(html).toContain(
        '<ol class="known-problems"><li>Build Error - Missing semicolon: Statement not terminated (Category: CompileTimeErrors)</li>' +
          '<li>Build Error - Off-by-one error: Loop runs once too often (Category: LogicalErrors)</li></ol>',
      );

      const removed = new URLSearchParams([
        ['mode', 'specific'],
        ['specific', 'build:CompileTimeErrors:Missing semicolon'],
        ['specific', 'build:LogicalErrors:Off-by-one error'],
        ['remove', 'build:CompileTimeErrors:Missing semicolon'],
      ]);
      const after = await (await get(`/errors?${removed}`)).text();
      expect(after).not.toContain('name="specific" value="build:CompileTimeErrors:Missing semicolon"');
      expect(after).toContain('<input type="hidden" name="specific" value="build:LogicalErrors:Off-by-one error">');
    });

    it('drops specific errors that are not in the catalog', async () => {
      const query = new URLSearchParams([
        ['mode', 'specific'],
        ['specific', 'build:LogicalErrors:Missing semicolon'],
      ]);
      const html = await (await get(`/errors?${query}`)).text();
      expect(html).not.toContain('name="specific"');
      expect(html).toContain(
        '<div class="info-message">No specific errors selected. Random errors will be used based on categories.</div>',
      );
      expect(html).toContain('<div class="info-message">Make a selection above to preview the problems of the next exercise.</div>');
    });

    it('filters the picker by type and search term', async () => {
      const html = await (await get('/errors?mode=specific&etype=checkstyle&q=camel')).text();
      expect(html).toContain('<input type="radio" name="etype" value="checkstyle" checked> Checkstyle Errors');
      expect(html).toContain('<button type="submit" class="btn" name="add" value="checkstyle:NamingConventionChecks:MemberName">Select</button>');
      expect(html).not.toContain('value="build:CompileTimeErrors:Missing semicolon"');
    });

    it('keeps the code parameters and ignores unknown values', async () => {
      const html = await (await get('/errors?difficulty=hard&length=extreme')).text();
      expect(html).toContain('<input type="radio" name="difficulty" value="hard" checked> Hard');
      expect(html).toContain('<input type="radio" name="length" value="medium" checked> Medium');
    });

    it('shows search results', async () => {
      const html = await (await get('/errors?q=camelcase')).text();
      expect(html).toContain('MemberName <span class="model-id">(NamingConventionChecks)</span>');
    });
  });

  describe('review page', () => {
    it('renders a later attempt', async () => {
      const res = await post('/review', { code: 'int x = 1;', iteration: 2, maxIterations: 3, theme: 'dark' });
      expect(res.status).toBe(200);
      const html = await res.text();
      expect(html).toContain('<html lang="en" data-theme="dark">');
      expect(html).toContain('<span class="iteration-badge">Attempt 2 of 3</span>');
      expect(html).toContain('int x = 1;');
    });

    it('rejects an iteration past the limit', async () => {
      const res = await post('/review', { code: 'x', iteration: 4, maxIterations: 3 });
      expect(res.status).toBe(400);
    });

    function submitForm(fields: URLSearchParams): Promise<Response> {
      return fetch(`${baseUrl}/review`, { method: 'POST', body: fields });
    }

    it('starts the next attempt from the submitted form', async () => {
      const form = renderReviewPage({ theme: 'light', code: 'int x = 1;', iteration: 1, maxIterations: 3 });
      expect(form).toContain('<form class="review-form" method="post" action="/review" data-review-form>');
      const fields = hiddenFields(form);
      fields.set('review', 'Line 1: x is a poor name');

      const res = await submitForm(fields);
      expect(res.status).toBe(200);
      const html = await res.text();
      expect(html).toContain('int x = 1;');
      expect(html).toContain('<span class="iteration-badge">Attempt 2 of 3</span>');
      expect(html).toContain('<div class="review-history-box"><pre>Line 1: x is a poor name</pre></div>');
      expect(hiddenFields(html).get('iteration')).toBe('2');
    });

    it('asks again for an empty review', async () => {
      const fields = hiddenFields(renderReviewPage({ theme: 'light', code: 'int x = 1;', iteration: 1, maxIterations: 3 }));
      fields.set('review', '   ');
      const res = await submitForm(fields);
      expect(res.status).toBe(400);
      const html = await res.text();
      expect(html).toContain('<div class="warning-message">Please enter your review before submitting.</div>');
      expect(hiddenFields(html).get('iteration')).toBe('1');
    });

    it('completes after the last attempt', async () => {
      const fields = hiddenFields(renderReviewPage({ theme: 'light', code: 'int x = 1;', iteration: 3, maxIterations: 3 }));
      fields.set('review', 'Line 1: still a poor name');
      const html = await (await submitForm(fields)).text();
      expect(html).toContain('<div class="info-message">Review complete: all 3 attempts used.</div>');
      expect(html).not.toContain('<form class="review-form"');
    });
  });

  describe('API', () => {
    it('keeps health open', async () => {
      const res = await get('/api/v1/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'ok',
        errorCatalog: { build: 2, checkstyle: 1 },
        gpu: 'available',
      });
    });

    it('requires the API key elsewhere', async () => {
      expect((await get('/api/v1/gpu')).status).toBe(401);
      expect((await get('/api/v1/gpu', { 'x-api-key': 'wrong' })).status).toBe(401);
    });

    it('reports GPU levels', async () => {
      const res = await get('/api/v1/gpu', { 'x-api-key': API_KEY });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        available: true,
        level: 'warning',
        gpus: [{ name: 'Test GPU', level: 'warning', memoryPercent: 12.5 }],
      });
    });

    it('returns theme variables', async () => {
      const res = await get('/api/v1/theme?theme=dark', { 'x-api-key': API_KEY });
      expect(await res.json()).toMatchObject({
        theme: 'dark',
        themes: ['light', 'dark'],
        variables: { primary: '#6c8aff', 'space-md': '16px' },
      });
    });

    it('returns the model overview with roles', async () => {
      const res = await get('/api/v1/models', { 'x-api-key': API_KEY });
      expect(await res.json()).toMatchObject({ connected: true, roles: { compare: 'phi3' } });
    });

    it('lists error categories', async () => {
      const res = await get('/api/v1/errors/categories', { 'x-api-key': API_KEY });
      expect(await res.json()).toEqual({ build: ['CompileTimeErrors', 'LogicalErrors'], checkstyle: ['NamingConventionChecks'] });
    });

    it('requires a search term', async () => {
      expect((await get('/api/v1/errors/search', { 'x-api-key': API_KEY })).status).toBe(400);
      const res = await get('/api/v1/errors/search?q=semicolon', { 'x-api-key': API_KEY });
      expect(await res.json()).toEqual({
        query: 'semicolon',
        results: [{ type: 'build', category: 'CompileTimeErrors', name: 'Missing semicolon', description: 'Statement not terminated' }],
      });
    });

    it('selects errors for focus areas', async () => {
      const res = await post('/api/v1/errors/select', { problemAreas: ['Logical'] }, { 'x-api-key': API_KEY });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        difficulty: 'medium',
        problems: ['Build Error - Off-by-one error: Loop runs once too often (Category: LogicalErrors)'],
      });
    });

    it('validates the selection request', async () => {
      const res = await post('/api/v1/errors/select', { count: 50 }, { 'x-api-key': API_KEY });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Invalid request body', issues: { count: expect.any(Array) } });
    });
  });
});
