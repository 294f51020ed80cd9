import { TriageConfig } from '../../config/triage';
import {
  BatchOutcome, ClassificationResult, DraftSubmission, EmailRecord, QueueItem,
  ResolvedEmail, TriageResult, TriagedEmail
} from '../../types/models';
import { GuardrailEngine } from '../guardrails/GuardrailEngine';
import { GuardrailContext, GuardrailVerdict } from '../guardrails/types';
import { Categorizer } from './Categorizer';
import { ClarificationDetector } from './ClarificationDetector';
import { ConflictResolver } from './ConflictResolver';
import { EdgeCaseRouter } from './EdgeCaseRouter';
import { IntentDetector } from './IntentDetector';
import { MetricsAggregator } from './MetricsAggregator';
import { ACTION_INTENTS, PriorityScorer } from './PriorityScorer';
import { QueueBuildContext, QueueBuilder } from './QueueBuilder';
import { SenderClassifier } from './SenderClassifier';

export interface TriageOptions {
  now?: Date;
  allowOversizedBatch?: boolean;
}

export type DraftMap = Record<string, DraftSubmission>;

/**
 * Raised instead of silently truncating a batch larger than the configured maximum
 */
export class BatchSizeError extends Error {
  public size: number;
  public limit: number;

  constructor(size: number, limit: number) {
    super(`Batch of ${size} emails exceeds the maximum of ${limit}`);
    this.name = 'BatchSizeError';
    this.size = size;
    this.limit = limit;
  }
}

/**
 * Deterministic triage pipeline.
 *
 * Phase one (`triage`) resolves conflicts across the whole batch, then
 * classifies, scores, categorizes and routes each message independently.
 * Drafting happens outside; phase two (`finalize`) checks whatever drafts
 * came back and assembles the queue and metrics.
 */
export class TriagePipeline {
  private readonly config: TriageConfig;
  private readonly conflictResolver: ConflictResolver;
  private readonly senderClassifier: SenderClassifier;
  private readonly intentDetector: IntentDetector;
  private readonly priorityScorer: PriorityScorer;
  private readonly categorizer: Categorizer;
  private readonly router: EdgeCaseRouter;
  private readonly guardrails: GuardrailEngine;
  private readonly clarifications: ClarificationDetector;
  private readonly queueBuilder: QueueBuilder;
  private readonly metrics: MetricsAggregator;

  constructor(config: TriageConfig) {
    this.config = config;
    this.conflictResolver = new ConflictResolver(config);
    this.senderClassifier = new SenderClassifier(config);
    this.intentDetector = new IntentDetector(config);
    this.priorityScorer = new PriorityScorer(config);
    this.categorizer = new Categorizer(config);
    this.router = new EdgeCaseRouter(config);
    this.guardrails = new GuardrailEngine(config);
    this.clarifications = new ClarificationDetector(config);
    this.queueBuilder = new QueueBuilder(config);
    this.metrics = new MetricsAggregator(config);
  }

  getConfig(): TriageConfig {
    return this.config;
  }

  /**
   * Phase one: everything that can be decided before a draft exists
   */
  triage(records: readonly EmailRecord[], options: TriageOptions = {}): TriageResult {
    this.assertBatchSize(records.length, options.allowOversizedBatch === true);
    const now = options.now ?? new Date();

    // Barrier: the whole batch is reduced before any per-message work
    const { resolved, superseded } = this.conflictResolver.resolve(records);
    const triaged = resolved.map(item => this.triageOne(item, now));
    const degradedCount = triaged.filter(item => item.degraded).length;

    if (degradedCount > 0) {
      console.warn(`Triage: ${degradedCount} degraded record(s) in batch of ${records.length}`);
    }
    console.log(`Triage: ${records.length} records -> ${triaged.length} messages (${superseded.length} superseded)`);

    return { triaged, superseded, degradedCount };
  }

  /**
   * Phase two: guardrails over returned drafts, decisions, queue and metrics
   */
  finalize(result: TriageResult, drafts: DraftMap = {}): BatchOutcome {
    const failedGuardrails: QueueBuildContext['failedGuardrails'] = [];

    const items: QueueItem[] = result.triaged.map(triaged => {
      const draft = Object.prototype.hasOwnProperty.call(drafts, triaged.record.messageId)
        ? drafts[triaged.record.messageId]
        : undefined;
      if (!draft) {
        return this.queueBuilder.buildItem(triaged, undefined, [], []);
      }

      const verdict = this.guardrails.evaluate(draft, {
        messageId: triaged.record.messageId,
        category: triaged.category
      });
      if (verdict.failedChecks.length > 0) {
        failedGuardrails.push({ messageId: triaged.record.messageId, kinds: verdict.failedChecks });
      }
      const questions = this.clarifications.questionsFor(draft);
      return this.queueBuilder.buildItem(triaged, draft, verdict.flags, questions);
    });

    const queue = this.queueBuilder.build(items, {
      superseded: result.superseded,
      degradedCount: result.degradedCount,
      failedGuardrails
    });
    const metrics = this.metrics.aggregate(items);

    console.log(
      `Triage queue built: ${queue.summary.totalProcessed} processed, ` +
      `${queue.summary.blocked} blocked, ${queue.summary.needsApproval} need approval, ` +
      `${queue.summary.deferred} deferred`
    );

    return { queue, metrics };
  }

  run(records: readonly EmailRecord[], drafts: DraftMap = {}, options: TriageOptions = {}): BatchOutcome {
    return this.finalize(this.triage(records, options), drafts);
  }

  /**
   * Guardrails for a single draft outside of a batch
   */
  checkDraft(draft: DraftSubmission, context: GuardrailContext = {}): GuardrailVerdict {
    return this.guardrails.evaluate(draft, context);
  }

  clarificationQuestions(draft: DraftSubmission): string[] {
    return this.clarifications.questionsFor(draft);
  }

  private triageOne(resolved: ResolvedEmail, now: Date): TriagedEmail {
    const record = resolved.record;
    const { profile, ruleId } = this.senderClassifier.classifyWithRule(record.sender);
    const degraded = profile.malformed || !record.body || record.body.trim().length === 0;

    const detection = this.intentDetector.detect(record);
    const classification: ClassificationResult = degraded
      ? { messageId: record.messageId, senderClass: 'SPAM_SUSPECT', intent: 'INFORMATIONAL', keywords: [], urgency: 'NONE' }
      : {
        messageId: record.messageId,
        senderClass: profile.senderClass,
        intent: detection.intent,
        keywords: detection.keywords,
        urgency: detection.urgency
      };

    const priority = this.priorityScorer.score({
      messageId: record.messageId,
      senderClass: classification.senderClass,
      intent: classification.intent,
      urgency: classification.urgency,
      receivedAt: record.receivedAt,
      threadDepth: resolved.threadDepth
    }, now);

    const assignment = this.categorizer.categorize(classification.intent, record);
    const routing = this.router.route({
      messageId: record.messageId,
      category: assignment.category,
      senderClass: classification.senderClass,
      priorityScore: priority.score
    });

    const replyWarranted = !degraded
      && ACTION_INTENTS.has(classification.intent)
      && classification.senderClass !== 'NO_REPLY'
      && assignment.category !== 'SPAM'
      && !routing.deferred;

    const notes = [
      `Sender ${profile.address || '(missing)'} classified ${classification.senderClass} by rule ${ruleId}`,
      classification.keywords.length > 0
        ? `Intent ${classification.intent} (keywords: ${classification.keywords.join(', ')})`
        : `Intent ${classification.intent}`,
      `Urgency ${classification.urgency}`,
      this.priorityScorer.explain(priority),
      `Category ${assignment.category} by rule ${assignment.matchedRule}`,
      ...routing.reasons
    ];
    if (degraded) notes.push('Degraded record: missing sender or empty body');
    if (resolved.consolidatedCount > 1) notes.push(`Consolidated ${resolved.consolidatedCount} messages`);

    if (process.env.TRIAGE_DEBUG === 'true') {
      console.log(`[TRIAGE DEBUG] ${record.messageId} ${notes.join(' | ')}`);
    }

    return {
      record,
      sender: profile,
      classification,
      priority,
      category: assignment.category,
      routing,
      threadDepth: resolved.threadDepth,
      consolidatedCount: resolved.consolidatedCount,
      degraded,
      replyWarranted,
      notes
    };
  }

  private assertBatchSize(size: number, allowOversized: boolean): void {
    if (size > this.config.maxBatchSize && !allowOversized) {
      throw new BatchSizeError(size, this.config.maxBatchSize);
    }
  }
}
