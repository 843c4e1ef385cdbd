import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { FastifyInstance } from 'fastify';
import { createServiceContainer, type ServiceContainer } from '../container.js';
import { instantSleep, TestClock } from '../test/clock.js';
import { createTestDatabase, resetDatabase, seedUser, type TestDatabase } from '../test/db.js';
import { FakeLlm, reply } from '../test/fake-llm.js';
import { buildApp } from './index.js';

type FormPart =
  | { name: string; value: string }
  | { name: string; fileName: string; content: string; contentType?: string };

const BOUNDARY = '----form-boundary-test';

function multipart(parts: FormPart[]) {
  const chunks = parts.map((part) => {
    if ('value' in part) {
      return `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"\r\n\r\n${part.value}\r\n`;
    }
    return `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"; filename="${part.fileName}"\r\n`
      + `Content-Type: ${part.contentType ?? 'text/plain'}\r\n\r\n${part.content}\r\n`;
  });
  return {
    payload: Buffer.from(`${chunks.join('')}--${BOUNDARY}--\r\n`),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

describe('HTTP API', () => {
  let testDb: TestDatabase;
  let root: string;
  let clock: TestClock;
  let llm: FakeLlm;
  let container: ServiceContainer;
  let app: FastifyInstance;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDatabase(testDb.db);
    root = await mkdtemp(join(tmpdir(), 'api-test-'));
    clock = new TestClock();
    llm = new FakeLlm(() => reply('A short summary.'));
    container = createServiceContainer({
      db: testDb.db,
      llm,
      storageRoot: root,
      defaultModel: 'claude-sonnet-4-20250514',
      retentionHours: 24,
      historyLimit: 50,
      clock: clock.now,
      sleep: instantSleep,
    });
    app = await buildApp(container, { logger: false });
  });

  afterEach(async () => {
    await container.runner.drain();
    await app.close();
    await rm(root, { recursive: true, force: true });
  });

  async function submitNotes(token: string) {
    const form = multipart([
      { name: 'documentKind', value: 'general' },
      { name: 'files', fileName: 'notes.txt', content: 'Some notes.' },
    ]);
    return app.inject({
      method: 'POST',
      url: '/api/modules/summarizer/jobs',
      headers: { ...form.headers, ...bearer(token) },
      payload: form.payload,
    });
  }

  it('serves the health check without a session', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok' });
  });

  it('rejects requests without a live session', async () => {
    const missing = await app.inject({ method: 'GET', url: '/api/modules' });
    const unknown = await app.inject({ method: 'GET', url: '/api/modules', headers: bearer('test-unknown') });

    expect(missing.statusCode).toBe(401);
    expect(unknown.statusCode).toBe(401);
    expect(unknown.json()).toEqual({ error: 'UNAUTHORIZED', message: 'A valid session is required' });
  });

  it('lists the registered modules', async () => {
    const { token } = await seedUser(testDb.db);

    const res = await app.inject({ method: 'GET', url: '/api/modules', headers: bearer(token) });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.map((m: { key: string }) => m.key)).toEqual([
      'summarizer',
      'translator',
      'grader',
      'info-extract',
      'reviewer',
    ]);
  });

  it('runs an uploaded document through to a downloadable summary', async () => {
    const { token } = await seedUser(testDb.db);

    const submitted = await submitNotes(token);
    expect(submitted.statusCode).toBe(202);
    const { jobId, projectedUnits, projectedTokens } = submitted.json().data;
    expect(projectedUnits).toBe(1);
    expect(projectedTokens).toBe(1027);

    await container.runner.drain();

    const status = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}`, headers: bearer(token) });
    expect(status.statusCode).toBe(200);
    const view = status.json().data;
    expect(view.status).toBe('completed');
    expect(view.statusDetail).toBe('Completed: 1 of 1 items succeeded');
    expect(view.usageDelta).toBe(1);
    expect(view.artifacts).toEqual([
      { name: 'combined_summary.txt', url: `/api/jobs/${jobId}/artifacts/combined_summary.txt` },
    ]);
    expect(view.items[0].downloadUrl).toBe(`/api/jobs/${jobId}/items/${view.items[0].id}/download`);

    const artifact = await app.inject({ method: 'GET', url: view.artifacts[0].url, headers: bearer(token) });
    expect(artifact.statusCode).toBe(200);
    expect(artifact.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(artifact.body).toBe('## 1. notes.txt\n\nA short summary.\n\n');

    const item = await app.inject({ method: 'GET', url: view.items[0].downloadUrl, headers: bearer(token) });
    expect(item.body).toBe('A short summary.');

    expect(llm.requests[0].messages[0].text).toBe('Document: notes.txt\n\nSome notes.');
    expect((await readdir(join(root, 'summarizer', jobId))).sort()).toEqual([
      'combined_summary.txt',
      'source_001.txt',
      'summary_001.txt',
    ]);
  });

  it('answers 410 for downloads once the job is purged', async () => {
    const { token } = await seedUser(testDb.db);
    const { jobId } = (await submitNotes(token)).json().data;
    await container.runner.drain();

    clock.advanceHours(25);
    expect(await container.sweeper.sweep()).toEqual({ scanned: 1, purged: 1, skipped: 0 });

    const res = await app.inject({
      method: 'GET',
      url: `/api/jobs/${jobId}/artifacts/combined_summary.txt`,
      headers: bearer(token),
    });
    expect(res.statusCode).toBe(410);
    expect(res.json().error).toBe('GONE');

    const status = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}`, headers: bearer(token) });
    expect(status.json().data).toMatchObject({ status: 'completed', filesPurged: true, artifacts: [] });
  });

  it('rejects a submission over quota and removes its uploads', async () => {
    const { token } = await seedUser(testDb.db, { limits: [{ moduleKey: 'summarizer', unitCap: 0 }] });

    const res = await submitNotes(token);

    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({
      error: 'QUOTA_EXCEEDED',
      message: 'Usage limit for this tool reached: 0 used in total, 1 requested, limit 0',
    });
    expect(await readdir(join(root, 'summarizer'))).toEqual([]);
    expect(llm.calls).toBe(0);
  });

  it('rejects unsupported files before storing anything', async () => {
    const { token } = await seedUser(testDb.db);
    const form = multipart([{ name: 'files', fileName: 'slides.pptx', content: 'x' }]);

    const res = await app.inject({
      method: 'POST',
      url: '/api/modules/summarizer/jobs',
      headers: { ...form.headers, ...bearer(token) },
      payload: form.payload,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('keeps jobs private to their owner', async () => {
    const owner = await seedUser(testDb.db);
    const other = await seedUser(testDb.db);
    const { jobId } = (await submitNotes(owner.token)).json().data;

    const res = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}`, headers: bearer(other.token) });

    expect(res.statusCode).toBe(403);
  });

  it('lists history and usage for the caller', async () => {
    const { token } = await seedUser(testDb.db, { tokenBudget: 50_000 });
    const { jobId } = (await submitNotes(token)).json().data;
    await container.runner.drain();

    const history = await app.inject({ method: 'GET', url: '/api/history?module=summarizer&limit=5', headers: bearer(token) });
    expect(history.json().data).toHaveLength(1);
    expect(history.json().data[0]).toMatchObject({ jobKey: jobId, status: 'completed', statusUrl: `/api/jobs/${jobId}` });

    const usage = await app.inject({ method: 'GET', url: '/api/usage', headers: bearer(token) });
    expect(usage.json().data).toMatchObject({
      windowDays: 7,
      tokensInWindow: 15,
      tokenBudget: 50_000,
      modules: [{ moduleKey: 'summarizer', units: 1, tokens: 15, unitCap: null, unitWindowDays: null }],
    });
  });

  describe('admin', () => {
    it('is closed to regular users', async () => {
      const { token } = await seedUser(testDb.db);

      const res = await app.inject({ method: 'GET', url: '/api/admin/modules/summarizer/config', headers: bearer(token) });

      expect(res.statusCode).toBe(403);
    });

    it('overrides a module model', async () => {
      const { token } = await seedUser(testDb.db, { isAdmin: true });

      const res = await app.inject({
        method: 'PUT',
        url: '/api/admin/modules/summarizer/config',
        headers: bearer(token),
        payload: { models: { summary: 'claude-3-5-haiku-20241022' } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.models).toEqual({
        summary: 'claude-3-5-haiku-20241022',
        translation: 'claude-sonnet-4-20250514',
      });
    });

    it('sets group limits', async () => {
      const { token, groupId } = await seedUser(testDb.db, { isAdmin: true });

      const res = await app.inject({
        method: 'PUT',
        url: `/api/admin/usage-groups/${groupId}`,
        headers: bearer(token),
        payload: { tokenBudget: 1000, modules: [{ moduleKey: 'grader', unitCap: 3 }] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toMatchObject({
        tokenBudget: 1000,
        modules: [{ moduleKey: 'grader', unitCap: 3, unitWindowDays: null }],
      });
    });

    it('maintains the glossary and journal catalogue', async () => {
      const { token } = await seedUser(testDb.db, { isAdmin: true });

      const term = await app.inject({
        method: 'PUT',
        url: '/api/admin/glossary',
        headers: bearer(token),
        payload: { sourceTerm: 'cohort', targetTerm: '队列' },
      });
      expect(term.statusCode).toBe(200);
      expect(term.json().data).toMatchObject({ sourceTerm: 'cohort', targetTerm: '队列' });

      await app.inject({ method: 'PUT', url: '/api/admin/journal-topics', headers: bearer(token), payload: { name: 'Oncology' } });
      const journal = await app.inject({
        method: 'PUT',
        url: '/api/admin/journals',
        headers: bearer(token),
        payload: { name: 'Journal A', lowBound: 30, topicScores: { Oncology: 2 } },
      });
      expect(journal.statusCode).toBe(200);
      expect(journal.json().data).toMatchObject({ name: 'Journal A', lowBound: 30, topicScores: { Oncology: 2 } });

      const unknown = await app.inject({
        method: 'PUT',
        url: '/api/admin/journals',
        headers: bearer(token),
        payload: { name: 'Journal B', lowBound: 30, topicScores: { Cardiology: 1 } },
      });
      expect(unknown.statusCode).toBe(400);

      const removed = await app.inject({ method: 'DELETE', url: `/api/admin/glossary/${term.json().data.id}`, headers: bearer(token) });
      expect(removed.statusCode).toBe(204);
      const glossary = await app.inject({ method: 'GET', url: '/api/admin/glossary', headers: bearer(token) });
      expect(glossary.json().data).toEqual([]);
    });
  });
});
