import { TriageConfig } from '../../config/triage';
import { BatchMetrics, Category, QueueItem } from '../../types/models';

export function emptyCategoryCounts(): Record<Category, number> {
  return { LEGAL: 0, FINANCE: 0, SPAM: 0, ACTION: 0, WAITING: 0, FYI: 0 };
}

/**
 * Folds queue items into batch metrics. Pure: the same items always give
 * the same metrics.
 */
export class MetricsAggregator {
  private readonly minutesPerEmail: number;

  constructor(config: TriageConfig) {
    this.minutesPerEmail = config.minutesPerEmail;
  }

  aggregate(items: readonly QueueItem[]): BatchMetrics {
    const categories = emptyCategoryCounts();
    let vipEmails = 0;
    let approvalRequiredCount = 0;
    let blockedCount = 0;
    let autoHandledCount = 0;

    for (const item of items) {
      categories[item.category]++;
      if (item.senderClass === 'VIP') vipEmails++;
      if (item.decision === 'NEEDS_APPROVAL') approvalRequiredCount++;
      if (item.decision === 'BLOCKED') blockedCount++;
      if (item.decision === 'AUTO_QUEUED' && !item.deferred) autoHandledCount++;
    }

    return {
      totalEmails: items.length,
      categories,
      vipEmails,
      approvalRequiredCount,
      blockedCount,
      autoHandledCount,
      timeSavedMinutes: autoHandledCount * this.minutesPerEmail
    };
  }
}
