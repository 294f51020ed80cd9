/**
 * Integration tests for TriageService over an in-memory deferred mail store
 */

import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { runMigrations } from '../../../database/migrations';
import { DeferredEmailRepository } from '../../../repositories/DeferredEmailRepository';
import { BatchSizeError, TriagePipeline } from '../../../services/triage/TriagePipeline';
import { TriageService } from '../../../services/triage/TriageService';
import { withDnd } from '../../../config/triage';
import { NOW, hoursBefore, makeConfig, makeRecord } from '../../helpers/fixtures';

describe('TriageService', () => {
  let db: Database;
  let repository: DeferredEmailRepository;

  const config = makeConfig();
  const slides = makeRecord({
    messageId: 'msg-slides',
    sender: 'bob@gmail.com',
    subject: 'Slides',
    body: 'Can you send the slides soon?'
  });

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    db = await open({
      filename: ':memory:',
      driver: sqlite3.Database
    });
    await runMigrations(db);
    repository = new DeferredEmailRepository(db);
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  it('should stamp every run with a batch id and timing', async () => {
    const service = new TriageService(new TriagePipeline(config), repository);
    const run = await service.run([slides], {}, { now: NOW });

    expect(run.batchId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(run.completedAt.getTime()).toBeGreaterThanOrEqual(run.startedAt.getTime());
    expect(run.outcome.queue.summary.totalProcessed).toBe(1);
  });

  it('should store deferred mail and release it once Do-Not-Disturb is off', async () => {
    const quiet = new TriageService(new TriagePipeline(withDnd(config, true)), repository);
    const first = await quiet.run([slides], {}, { now: NOW });

    expect(first.deferredStored).toBe(1);
    expect(first.reinjected).toBe(0);
    expect((await quiet.listDeferred()).map(record => record.messageId)).toEqual(['msg-slides']);

    const resumed = new TriageService(new TriagePipeline(config), repository);
    const second = await resumed.run([], {}, { now: NOW });

    expect(second.reinjected).toBe(1);
    expect(second.outcome.queue.topItems.map(item => item.messageId)).toEqual(['msg-slides']);
    expect(await repository.count()).toBe(0);
  });

  it('should keep deferred mail stored while Do-Not-Disturb stays on', async () => {
    await repository.save(slides, 45, NOW);
    const quiet = new TriageService(new TriagePipeline(withDnd(config, true)), repository);

    const run = await quiet.run([], {}, { now: NOW });

    expect(run.reinjected).toBe(0);
    expect(await repository.count()).toBe(1);
  });

  it('should also store deferred mail from phase one', async () => {
    const quiet = new TriageService(new TriagePipeline(withDnd(config, true)), repository);
    const run = await quiet.triage([slides], { now: NOW });

    expect(run.result.triaged[0].routing.deferred).toBe(true);
    expect(run.deferredStored).toBe(1);
    expect(await repository.count()).toBe(1);
  });

  it('should leave deferred mail stored for the next full run after phase one', async () => {
    await repository.save(slides, 45, NOW);
    const service = new TriageService(new TriagePipeline(config), repository);

    const phaseOne = await service.triage([], { now: NOW });

    expect(phaseOne.reinjected).toBe(0);
    expect(phaseOne.result.triaged).toEqual([]);
    expect(await repository.count()).toBe(1);

    const run = await service.run([], {}, { now: NOW });

    expect(run.reinjected).toBe(1);
    expect(run.outcome.queue.topItems.map(item => item.messageId)).toEqual(['msg-slides']);
    expect(await repository.count()).toBe(0);
  });

  it('should keep released mail stored when the batch fails before completing', async () => {
    await repository.save(slides, 45, NOW);
    const pipeline = new TriagePipeline(config);
    jest.spyOn(pipeline, 'finalize').mockImplementation(() => {
      throw new Error('finalize failed');
    });
    const service = new TriageService(pipeline, repository);

    await expect(service.run([], {}, { now: NOW })).rejects.toThrow('finalize failed');
    expect((await repository.list()).map(row => row.message_id)).toEqual(['msg-slides']);
  });

  it('should only release as much as fits under the batch limit', async () => {
    const small = makeConfig(draft => {
      draft.maxBatchSize = 2;
    });
    await repository.saveAll([
      { record: makeRecord({ messageId: 'held-1', sender: 'a@company.com', receivedAt: hoursBefore(NOW, 4) }), priorityScore: 10 },
      { record: makeRecord({ messageId: 'held-2', sender: 'b@company.com', receivedAt: hoursBefore(NOW, 2) }), priorityScore: 10 }
    ], NOW);
    const service = new TriageService(new TriagePipeline(small), repository);

    const run = await service.run([makeRecord({ messageId: 'fresh', sender: 'c@company.com' })], {}, { now: NOW });

    expect(run.reinjected).toBe(1);
    expect(run.outcome.queue.summary.totalProcessed).toBe(2);
    expect((await repository.list()).map(row => row.message_id)).toEqual(['held-2']);
  });

  it('should prefer the caller\'s copy of a message that was also stored', async () => {
    await repository.save(slides, 45, NOW);
    const service = new TriageService(new TriagePipeline(config), repository);

    const run = await service.run([slides], {}, { now: NOW });

    expect(run.reinjected).toBe(0);
    expect(run.outcome.queue.summary.totalProcessed).toBe(1);
    expect(await repository.count()).toBe(0);
  });

  it('should release nothing and reject a batch that is already too large', async () => {
    await repository.save(slides, 45, NOW);
    const service = new TriageService(new TriagePipeline(makeConfig(draft => {
      draft.maxBatchSize = 2;
    })), repository);
    const batch = ['a', 'b', 'c'].map(id => makeRecord({ messageId: id, sender: `${id}@company.com` }));

    await expect(service.run(batch)).rejects.toThrow(BatchSizeError);
    expect(await repository.count()).toBe(1);
  });
});
