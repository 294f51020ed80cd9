import { TriageConfig } from '../../config/triage';
import { EmailRecord, ResolvedEmail, SupersededRecord } from '../../types/models';

export interface ConflictResolution {
  resolved: ResolvedEmail[];
  superseded: SupersededRecord[];
}

const REPLY_PREFIX = /^\s*(re|fwd?|aw)\s*:\s*/i;

function timeOf(record: EmailRecord): number {
  const time = record.receivedAt instanceof Date ? record.receivedAt.getTime() : NaN;
  return Number.isFinite(time) ? time : Number.NEGATIVE_INFINITY;
}

/**
 * Orders by timestamp, then message id, so the outcome never depends on the
 * order records arrived in
 */
function compareRecency(a: EmailRecord, b: EmailRecord): number {
  const diff = timeOf(a) - timeOf(b);
  if (diff !== 0 && !Number.isNaN(diff)) return diff < 0 ? -1 : 1;
  return a.messageId < b.messageId ? -1 : a.messageId > b.messageId ? 1 : 0;
}

export function stripReplyPrefixes(subject: string): { subject: string; depth: number } {
  let remaining = subject || '';
  let depth = 0;
  while (REPLY_PREFIX.test(remaining)) {
    remaining = remaining.replace(REPLY_PREFIX, '');
    depth++;
  }
  return { subject: remaining.trim().toLowerCase(), depth };
}

/**
 * Whole-batch barrier run before any per-message classification. Keeps the
 * newest record of every thread and, optionally, folds bursts of the same
 * sender and subject into a single logical item.
 */
export class ConflictResolver {
  private readonly config: TriageConfig;

  constructor(config: TriageConfig) {
    this.config = config;
  }

  resolve(records: readonly EmailRecord[]): ConflictResolution {
    const superseded: SupersededRecord[] = [];
    const threads = new Map<string, EmailRecord[]>();

    for (const record of records) {
      const key = record.threadId && record.threadId.trim()
        ? `thread:${record.threadId.trim()}`
        : `message:${record.messageId}`;
      const group = threads.get(key);
      if (group) {
        group.push(record);
      } else {
        threads.set(key, [record]);
      }
    }

    let resolved: ResolvedEmail[] = [];
    for (const group of threads.values()) {
      const ordered = [...group].sort(compareRecency);
      const latest = ordered[ordered.length - 1];
      const earlier = ordered.slice(0, -1);

      for (const record of earlier) {
        superseded.push({ messageId: record.messageId, supersededBy: latest.messageId, reason: 'thread' });
      }

      resolved.push({
        record: latest,
        threadDepth: Math.max(group.length, stripReplyPrefixes(latest.subject).depth + 1),
        consolidatedCount: 1,
        supersededIds: earlier.map(record => record.messageId)
      });
    }

    if (this.config.conflicts.consolidateBursts) {
      resolved = this.consolidateBursts(resolved, superseded);
    }

    return {
      resolved: resolved.sort((a, b) => compareRecency(a.record, b.record)),
      superseded: superseded.sort((a, b) => (a.messageId < b.messageId ? -1 : a.messageId > b.messageId ? 1 : 0))
    };
  }

  private consolidateBursts(items: ResolvedEmail[], superseded: SupersededRecord[]): ResolvedEmail[] {
    const windowMs = this.config.conflicts.burstWindowMinutes * 60 * 1000;
    const bySenderAndSubject = new Map<string, ResolvedEmail[]>();
    const result: ResolvedEmail[] = [];

    for (const item of items) {
      const sender = (item.record.sender || '').trim().toLowerCase();
      if (!sender) {
        result.push(item);
        continue;
      }
      const key = `${sender}|${stripReplyPrefixes(item.record.subject).subject}`;
      const bucket = bySenderAndSubject.get(key);
      if (bucket) {
        bucket.push(item);
      } else {
        bySenderAndSubject.set(key, [item]);
      }
    }

    for (const bucket of bySenderAndSubject.values()) {
      const ordered = bucket.sort((a, b) => compareRecency(a.record, b.record));
      let cluster: ResolvedEmail[] = [];

      for (const item of ordered) {
        const previous = cluster[cluster.length - 1];
        if (previous && timeOf(item.record) - timeOf(previous.record) > windowMs) {
          result.push(this.mergeCluster(cluster, superseded));
          cluster = [];
        }
        cluster.push(item);
      }
      if (cluster.length > 0) {
        result.push(this.mergeCluster(cluster, superseded));
      }
    }

    return result;
  }

  private mergeCluster(cluster: ResolvedEmail[], superseded: SupersededRecord[]): ResolvedEmail {
    const latest = cluster[cluster.length - 1];
    if (cluster.length === 1) {
      return latest;
    }

    const supersededIds = [...latest.supersededIds];
    for (const item of cluster.slice(0, -1)) {
      superseded.push({ messageId: item.record.messageId, supersededBy: latest.record.messageId, reason: 'burst' });
      supersededIds.push(item.record.messageId, ...item.supersededIds);
    }

    return {
      record: latest.record,
      threadDepth: Math.max(...cluster.map(item => item.threadDepth)),
      consolidatedCount: cluster.reduce((sum, item) => sum + item.consolidatedCount, 0),
      supersededIds: supersededIds.sort()
    };
  }
}
