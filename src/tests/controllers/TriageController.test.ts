import request from 'supertest';
import express from 'express';
import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { TriageController } from '../../controllers/TriageController';
import { runMigrations } from '../../database/migrations';
import { DeferredEmailRepository } from '../../repositories/DeferredEmailRepository';
import { TriagePipeline } from '../../services/triage/TriagePipeline';
import { TriageService } from '../../services/triage/TriageService';
import { makeConfig } from '../helpers/fixtures';

describe('TriageController', () => {
  let app: express.Application;
  let db: Database;
  let triageService: TriageService;

  const config = makeConfig(draft => {
    draft.domains.vipAddresses = ['ceo@company.com'];
    draft.maxBatchSize = 3;
  });

  const vipEmail = {
    message_id: 'msg-vip',
    thread_id: 'thread-vip',
    sender: 'ceo@company.com',
    display_name: 'The CEO',
    subject: 'URGENT: contract signature needed today',
    body: 'Our attorney has reviewed it. Please sign and return.',
    received_at: '2026-03-02T12:00:00.000Z'
  };
  const customerEmail = {
    message_id: 'msg-customer',
    sender: 'bob@gmail.com',
    subject: 'Account question',
    body: 'Can you confirm my details?',
    received_at: '2026-03-02T11:00:00.000Z'
  };

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    db = await open({
      filename: ':memory:',
      driver: sqlite3.Database
    });
    await runMigrations(db);

    triageService = new TriageService(new TriagePipeline(config), new DeferredEmailRepository(db));
    const triageController = new TriageController(triageService, config);

    app = express();
    app.use(express.json());
    app.post('/api/triage', triageController.triage.bind(triageController));
    app.post('/api/triage/run', triageController.run.bind(triageController));
    app.get('/api/triage/deferred', triageController.listDeferred.bind(triageController));
    app.post('/api/guardrails/check', triageController.checkGuardrails.bind(triageController));
    app.get('/api/config', triageController.getConfig.bind(triageController));
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  describe('POST /api/triage', () => {
    it('should return phase-one results for every message', async () => {
      const response = await request(app)
        .post('/api/triage')
        .send({ emails: [vipEmail, customerEmail] })
        .expect(200);

      expect(response.body.batch_id).toEqual(expect.any(String));
      expect(response.body.degraded_count).toBe(0);
      expect(response.body.messages.map((m: { message_id: string; category: string }) => [m.message_id, m.category]))
        .toEqual([['msg-customer', 'ACTION'], ['msg-vip', 'LEGAL']]);
    });

    it('should return 400 for an invalid payload', async () => {
      const response = await request(app)
        .post('/api/triage')
        .send({ emails: [{ sender: 'bob@gmail.com' }] })
        .expect(400);

      expect(response.body.error).toBe('Invalid request');
      expect(response.body.details).toEqual([
        '"emails[0].message_id" is required',
        '"emails[0].received_at" is required'
      ]);
    });
  });

  describe('POST /api/triage/run', () => {
    it('should escalate legal mail from a VIP', async () => {
      const response = await request(app)
        .post('/api/triage/run')
        .send({ emails: [vipEmail] })
        .expect(200);

      const item = response.body.queue.top_n[0];
      expect(item.message_id).toBe('msg-vip');
      expect(item.category).toBe('LEGAL');
      expect(item.sender_class).toBe('VIP');
      expect(item.decision).toBe('NEEDS_APPROVAL');
      expect(response.body.metrics.vip_emails).toBe(1);
      expect(response.body.queue.warnings).toEqual(['1 legal/finance item(s) escalated for approval']);
    });

    it('should block a draft carrying an SSN', async () => {
      const response = await request(app)
        .post('/api/triage/run')
        .send({
          emails: [customerEmail],
          drafts: {
            'msg-customer': { draft_id: 'draft-1', body: 'SSN: 123-45-6789', recipients: ['external@unknown.org'] }
          }
        })
        .expect(200);

      expect(response.body.queue.blocked_items).toEqual([{
        message_id: 'msg-customer',
        reason: 'Blocked by PII guardrail',
        flags: [
          { kind: 'PII', severity: 'BLOCK', evidence: '*******6789', matched_pattern: 'ssn' },
          { kind: 'DOMAIN', severity: 'WARN', evidence: 'external recipient domain unknown.org', matched_pattern: 'external_domain' }
        ]
      }]);
      expect(response.body.queue.summary.blocked).toBe(1);
      expect(response.body.queue.top_n[0].draft_reference).toBe('draft-1');
    });

    it('should return 413 for an oversized batch', async () => {
      const emails = ['a', 'b', 'c', 'd'].map(id => ({
        message_id: id,
        sender: `${id}@company.com`,
        body: 'Status update.',
        received_at: '2026-03-02T12:00:00.000Z'
      }));

      const response = await request(app)
        .post('/api/triage/run')
        .send({ emails })
        .expect(413);

      expect(response.body).toEqual({
        error: 'Batch too large',
        message: 'Batch of 4 emails exceeds the maximum of 3',
        limit: 3
      });

      await request(app)
        .post('/api/triage/run')
        .send({ emails, allow_oversized_batch: true })
        .expect(200);
    });

    it('should return 500 when the service fails', async () => {
      jest.spyOn(triageService, 'run').mockRejectedValue(new Error('disk full'));

      const response = await request(app)
        .post('/api/triage/run')
        .send({ emails: [customerEmail] })
        .expect(500);

      expect(response.body).toEqual({ error: 'Internal server error', message: 'Triage run failed' });
    });
  });

  describe('POST /api/guardrails/check', () => {
    it('should return the verdict and clarification questions', async () => {
      const response = await request(app)
        .post('/api/guardrails/check')
        .send({ draft: { draft_id: 'draft-2', body: 'lol sure', recipients: ['alice@company.com'] } })
        .expect(200);

      expect(response.body).toEqual({
        draft_id: 'draft-2',
        verdict: 'ESCALATE',
        flags: [{ kind: 'TONE', severity: 'WARN', evidence: '"lol" (slang language)', matched_pattern: 'slang:lol' }],
        failed_checks: [],
        clarification_questions: []
      });
    });

    it('should return 400 without a draft', async () => {
      await request(app).post('/api/guardrails/check').send({}).expect(400);
    });
  });

  describe('GET /api/triage/deferred', () => {
    it('should list nothing when no mail is held back', async () => {
      const response = await request(app).get('/api/triage/deferred').expect(200);
      expect(response.body).toEqual({ count: 0, deferred: [] });
    });
  });

  describe('GET /api/config', () => {
    it('should expose the effective thresholds', async () => {
      const response = await request(app).get('/api/config').expect(200);

      expect(response.body.priority_threshold).toBe(70);
      expect(response.body.max_batch_size).toBe(3);
      expect(response.body.domains.vip_addresses).toEqual(['ceo@company.com']);
      expect(response.body.guardrails).toEqual({ pii: true, domain: true, tone: true, risk: true });
    });
  });
});
