import { v4 as uuidv4 } from 'uuid';
import { BatchOutcome, DraftSubmission, EmailRecord, TriageResult } from '../../types/models';
import { GuardrailContext, GuardrailVerdict } from '../guardrails/types';
import { DeferredEmailRepository } from '../../repositories/DeferredEmailRepository';
import { deferredRowToRecord } from '../../models/transformers';
import { DraftMap, TriageOptions, TriagePipeline } from './TriagePipeline';

export interface BatchRunInfo {
  batchId: string;
  startedAt: Date;
  completedAt: Date;
  reinjected: number;
  deferredStored: number;
}

export interface TriageRun extends BatchRunInfo {
  result: TriageResult;
}

export interface BatchRun extends BatchRunInfo {
  outcome: BatchOutcome;
}

interface ReleasedBatch {
  records: EmailRecord[];
  reinjected: number;
  released: string[];
}

/**
 * Wraps the pure pipeline with the stateful parts of a batch run: batch
 * identity, timing, and the store of mail held back by Do-Not-Disturb.
 */
export class TriageService {
  constructor(
    private readonly pipeline: TriagePipeline,
    private readonly deferredRepository: DeferredEmailRepository
  ) {}

  /**
   * Phase one only, for callers that draft replies before finalizing. Stored
   * deferred mail stays stored: only a full run can take it back.
   */
  async triage(records: readonly EmailRecord[], options: TriageOptions = {}): Promise<TriageRun> {
    const batchId = uuidv4();
    const startedAt = new Date();

    const result = this.pipeline.triage(records, options);
    const deferredStored = await this.storeDeferred(result);

    return {
      batchId,
      startedAt,
      completedAt: new Date(),
      reinjected: 0,
      deferredStored,
      result
    };
  }

  /**
   * Both phases in one call, with whatever drafts the caller already has.
   * Released deferred mail is removed from the store only after the batch
   * has been finalized.
   */
  async run(records: readonly EmailRecord[], drafts: DraftMap = {}, options: TriageOptions = {}): Promise<BatchRun> {
    const batchId = uuidv4();
    const startedAt = new Date();
    console.log(`📥 Batch ${batchId}: ${records.length} record(s) received`);

    const batch = await this.withReleasedDeferred(records);
    const result = this.pipeline.triage(batch.records, options);
    const outcome = this.pipeline.finalize(result, drafts);

    await this.deferredRepository.removeAll(batch.released);
    const deferredStored = await this.storeDeferred(result);

    const completedAt = new Date();
    console.log(`✅ Batch ${batchId} completed in ${completedAt.getTime() - startedAt.getTime()}ms`);

    return {
      batchId,
      startedAt,
      completedAt,
      reinjected: batch.reinjected,
      deferredStored,
      outcome
    };
  }

  checkDraft(draft: DraftSubmission, context: GuardrailContext = {}): GuardrailVerdict {
    return this.pipeline.checkDraft(draft, context);
  }

  clarificationQuestions(draft: DraftSubmission): string[] {
    return this.pipeline.clarificationQuestions(draft);
  }

  async listDeferred(): Promise<EmailRecord[]> {
    const rows = await this.deferredRepository.list();
    return rows.map(deferredRowToRecord);
  }

  /**
   * With Do-Not-Disturb off, previously deferred mail rejoins the batch, up
   * to the room left under the batch limit. A record the caller sent again
   * takes precedence over its stored copy. `released` names every stored
   * row read, including those the caller's copy replaced.
   */
  private async withReleasedDeferred(records: readonly EmailRecord[]): Promise<ReleasedBatch> {
    const config = this.pipeline.getConfig();
    if (config.dnd.enabled) {
      return { records: [...records], reinjected: 0, released: [] };
    }

    const capacity = Math.max(0, config.maxBatchSize - records.length);
    const stored = await this.deferredRepository.peekOldest(capacity);
    const present = new Set(records.map(record => record.messageId));
    const additions = stored.filter(record => !present.has(record.messageId));

    if (additions.length > 0) {
      console.log(`📤 Releasing ${additions.length} deferred record(s) into the batch`);
    }

    return {
      records: [...records, ...additions],
      reinjected: additions.length,
      released: stored.map(record => record.messageId)
    };
  }

  private async storeDeferred(result: TriageResult): Promise<number> {
    const deferred = result.triaged.filter(item => item.routing.deferred);
    await this.deferredRepository.saveAll(deferred.map(item => ({
      record: item.record,
      priorityScore: item.priority.score
    })));
    return deferred.length;
  }
}
