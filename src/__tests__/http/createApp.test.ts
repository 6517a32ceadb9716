import type { Express } from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryTaggingConfigStore } from '../../infrastructure/adapters/config/InMemoryTaggingConfigStore.js';
import { InMemoryDatasetStore } from '../../infrastructure/adapters/storage/InMemoryDatasetStore.js';
import { AppContainer } from '../../infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../../infrastructure/config/Config.js';
import { createApp } from '../../infrastructure/http/createApp.js';
import { FakeRawSource } from '../fixtures.js';

const january = [
  'Started Date,Description,Amount,Currency',
  '2024-01-05 09:12:00,Coffee Shop,-4.50,EUR',
  '2024-01-06 18:30:00,XYZ123,-12.00,EUR',
  '',
].join('\n');

describe('HTTP API', () => {
  let app: Express;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    app = createApp(
      new AppContainer({
        config: loadConfig({ DATA_DIR: '/srv/spending' }),
        datasetStore: new InMemoryDatasetStore(),
        taggingConfigStore: new InMemoryTaggingConfigStore({
          tags: { Food: 1 },
          vendorTags: { 'coffee shop': { Food: 1 } },
          mainCategories: [],
        }),
        rawSource: new FakeRawSource({ 'jan.csv': january }),
      }),
    );
  });

  it('answers the health check', async () => {
    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.name).toBe('Spending Tagger API');
  });

  it('lists raw exports', async () => {
    const response = await request(app).get('/api/raw-files');

    expect(response.status).toBe(200);
    expect(response.body.files.map((file: { fileName: string }) => file.fileName)).toEqual(['jan.csv']);
  });

  it('imports an uploaded export', async () => {
    const response = await request(app).post('/api/imports').attach('export', Buffer.from(january), 'jan.csv');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ fileName: 'jan.csv', added: 2, preserved: 0 });
    expect(response.body.pendingVendors).toEqual([
      { vendor: 'XYZ123', vendorKey: 'xyz123', total: -12, count: 1, known: false },
    ]);
  });

  it('imports a raw export by name and tags its vendors', async () => {
    await request(app).post('/api/imports').send({ fileName: 'jan.csv' }).expect(200);

    const tagged = await request(app).post('/api/tagging/vendors').send({ vendors: ['XYZ123'], labels: ['Fun'] });
    expect(tagged.body).toEqual({ affected: 1 });

    const progress = await request(app).get('/api/tagging/progress');
    expect(progress.body).toEqual({ total: 2, tagged: 2, untagged: 0, percentage: 100 });

    const report = await request(app).get('/api/reports/categories').query({ currency: 'EUR' });
    expect(report.body).toEqual({
      total: -16.5,
      categories: [
        { category: 'Fun', total: -12, count: 1 },
        { category: 'Food', total: -4.5, count: 1 },
      ],
    });
  });

  it('suggests labels for a vendor', async () => {
    const response = await request(app).get('/api/tagging/suggestions').query({ vendor: 'Coffee Shop' });

    expect(response.body).toEqual({ suggestions: [{ label: 'Food', count: 1, suggested: true }] });
  });

  it('maps pipeline errors to status codes', async () => {
    const missing = await request(app).post('/api/imports').send({ fileName: 'feb.csv' });
    expect(missing.status).toBe(404);
    expect(missing.body.code).toBe('STORAGE_IO_ERROR');

    const schema = await request(app)
      .post('/api/imports')
      .attach('export', Buffer.from('Date,Text\n2024-01-01,Grocer\n'), 'bad.csv');
    expect(schema.status).toBe(422);
    expect(schema.body.code).toBe('SCHEMA_ERROR');

    const unknownKey = await request(app).get('/api/transactions/unknown/day');
    expect(unknownKey.status).toBe(404);
    expect(unknownKey.body.code).toBe('NOT_FOUND');
  });

  it('rejects invalid requests', async () => {
    const noFile = await request(app).post('/api/imports').send({});
    expect(noFile.status).toBe(400);
    expect(noFile.body.error).toBe('Invalid request');

    const badDate = await request(app).get('/api/reports/monthly').query({ from: '05/01/2024' });
    expect(badDate.status).toBe(400);

    const impossibleDate = await request(app).get('/api/reports/categories').query({ to: '2024-13-45' });
    expect(impossibleDate.status).toBe(400);

    const pdf = await request(app).post('/api/imports').attach('export', Buffer.from('%PDF'), 'statement.pdf');
    expect(pdf.status).toBe(415);
  });

  it('returns 404 for unknown endpoints', async () => {
    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'API endpoint not found' });
  });
});
