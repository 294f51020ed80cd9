import { TriageConfig } from '../../config/triage';
import {
  BlockedItem, DraftSubmission, GuardrailFlag, QueueDecision, QueueItem, QueueSummary,
  SupersededRecord, TriageQueue, TriagedEmail
} from '../../types/models';

export interface QueueBuildContext {
  superseded: SupersededRecord[];
  degradedCount: number;
  failedGuardrails: Array<{ messageId: string; kinds: string[] }>;
}

/**
 * Ranking order for the queue: score descending, then the earlier message,
 * then message id so the order is total
 */
export function compareQueueItems(a: QueueItem, b: QueueItem): number {
  if (a.priorityScore !== b.priorityScore) return b.priorityScore - a.priorityScore;
  const timeDiff = a.receivedAt.getTime() - b.receivedAt.getTime();
  if (timeDiff !== 0 && !Number.isNaN(timeDiff)) return timeDiff;
  return a.messageId < b.messageId ? -1 : a.messageId > b.messageId ? 1 : 0;
}

/**
 * Final decision for one message. BLOCKED exactly when a guardrail raised a
 * BLOCK flag; escalated legal/finance mail is never auto-queued.
 */
export function decide(
  triaged: TriagedEmail,
  flags: readonly GuardrailFlag[],
  clarificationQuestions: readonly string[]
): QueueDecision {
  if (flags.some(flag => flag.severity === 'BLOCK')) return 'BLOCKED';
  if (triaged.routing.escalated) return 'NEEDS_APPROVAL';
  if (clarificationQuestions.length > 0) return 'NEEDS_CLARIFICATION';
  if (flags.length > 0) return 'NEEDS_APPROVAL';
  return 'AUTO_QUEUED';
}

export function blockReason(flags: readonly GuardrailFlag[]): string {
  const kinds = Array.from(new Set(flags.filter(flag => flag.severity === 'BLOCK').map(flag => flag.kind)));
  return `Blocked by ${kinds.join(', ')} guardrail${kinds.length > 1 ? 's' : ''}`;
}

export class QueueBuilder {
  private readonly topN: number;

  constructor(config: TriageConfig) {
    this.topN = config.topN;
  }

  buildItem(
    triaged: TriagedEmail,
    draft: DraftSubmission | undefined,
    flags: GuardrailFlag[],
    clarificationQuestions: string[]
  ): QueueItem {
    const decision = decide(triaged, flags, clarificationQuestions);
    return {
      messageId: triaged.record.messageId,
      threadId: triaged.record.threadId,
      subject: triaged.record.subject,
      receivedAt: triaged.record.receivedAt,
      priorityScore: triaged.priority.score,
      priorityBand: triaged.priority.band,
      category: triaged.category,
      senderClass: triaged.classification.senderClass,
      intent: triaged.classification.intent,
      draftReference: draft?.draftId,
      guardrailFlags: flags,
      decision,
      deferred: triaged.routing.deferred,
      autoRespond: triaged.routing.autoRespond,
      clarificationQuestions,
      reasoning: triaged.priority.reasoning,
      notes: [...triaged.notes, `Decision ${decision}`]
    };
  }

  build(items: readonly QueueItem[], context: QueueBuildContext): TriageQueue {
    const active = items.filter(item => !item.deferred).sort(compareQueueItems);
    const deferredItems = items.filter(item => item.deferred).sort(compareQueueItems);

    const blockedItems: BlockedItem[] = items
      .filter(item => item.decision === 'BLOCKED')
      .sort(compareQueueItems)
      .map(item => ({ messageId: item.messageId, reason: blockReason(item.guardrailFlags), flags: item.guardrailFlags }));

    return {
      summary: this.summarize(items),
      topItems: active.slice(0, this.topN),
      blockedItems,
      deferredItems,
      superseded: context.superseded,
      warnings: this.collectWarnings(items, context)
    };
  }

  summarize(items: readonly QueueItem[]): QueueSummary {
    const count = (predicate: (item: QueueItem) => boolean): number => items.filter(predicate).length;
    return {
      totalProcessed: items.length,
      highPriority: count(item => item.priorityBand === 'HIGH'),
      mediumPriority: count(item => item.priorityBand === 'MEDIUM'),
      lowPriority: count(item => item.priorityBand === 'LOW'),
      draftsCreated: count(item => item.draftReference !== undefined),
      needsApproval: count(item => item.decision === 'NEEDS_APPROVAL'),
      blocked: count(item => item.decision === 'BLOCKED'),
      followUps: count(item => item.category === 'WAITING'),
      needsClarification: count(item => item.decision === 'NEEDS_CLARIFICATION'),
      deferred: count(item => item.deferred)
    };
  }

  private collectWarnings(items: readonly QueueItem[], context: QueueBuildContext): string[] {
    const warnings: string[] = [];
    const escalated = items.filter(item => item.category === 'LEGAL' || item.category === 'FINANCE').length;
    const deferred = items.filter(item => item.deferred).length;
    const blocked = items.filter(item => item.decision === 'BLOCKED').length;

    if (escalated > 0) warnings.push(`${escalated} legal/finance item(s) escalated for approval`);
    if (blocked > 0) warnings.push(`${blocked} draft(s) blocked by guardrails`);
    if (deferred > 0) warnings.push(`${deferred} item(s) deferred by Do-Not-Disturb`);
    if (context.degradedCount > 0) {
      warnings.push(`${context.degradedCount} degraded record(s) classified as SPAM_SUSPECT/INFORMATIONAL`);
    }
    if (context.superseded.length > 0) {
      warnings.push(`${context.superseded.length} superseded record(s) dropped by conflict resolution`);
    }
    for (const failure of context.failedGuardrails) {
      warnings.push(`Guardrail check(s) ${failure.kinds.join(', ')} failed for ${failure.messageId}; no flags recorded`);
    }
    return warnings;
  }
}
