import defaultRules from '../../config/defaultRules.json';
import { TriageConfig, buildTriageConfig } from '../../config/triage';
import {
  Category, DraftSubmission, EmailRecord, PriorityBand, SenderClass, TriagedEmail
} from '../../types/models';

export const NOW = new Date('2026-03-02T12:00:00.000Z');

/**
 * Validated configuration built from the bundled rules, adjusted in place by
 * `adjust` before validation
 */
export function makeConfig(adjust: (draft: TriageConfig) => void = () => undefined): TriageConfig {
  const draft: TriageConfig = structuredClone(defaultRules);
  adjust(draft);
  return buildTriageConfig(draft);
}

export function makeRecord(overrides: Partial<EmailRecord> = {}): EmailRecord {
  return {
    messageId: 'msg-1',
    threadId: '',
    sender: 'alice@company.com',
    displayName: 'Alice',
    subject: 'Offsite notes',
    body: 'Sharing the notes from the offsite.',
    receivedAt: NOW,
    labels: [],
    ...overrides
  };
}

export function makeDraft(overrides: Partial<DraftSubmission> = {}): DraftSubmission {
  return {
    draftId: 'draft-1',
    body: 'Thanks, I will take a look and get back to you.',
    recipients: ['alice@company.com'],
    ...overrides
  };
}

export function hoursBefore(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * 60 * 60 * 1000);
}

export interface TriagedOverrides {
  messageId?: string;
  score?: number;
  band?: PriorityBand;
  category?: Category;
  senderClass?: SenderClass;
  escalated?: boolean;
  deferred?: boolean;
  receivedAt?: Date;
}

/**
 * Phase-one output for queue and metrics tests, without running the pipeline
 */
export function makeTriaged(overrides: TriagedOverrides = {}): TriagedEmail {
  const messageId = overrides.messageId ?? 'msg-1';
  const senderClass = overrides.senderClass ?? 'TEAM';
  const score = overrides.score ?? 50;
  return {
    record: makeRecord({ messageId, receivedAt: overrides.receivedAt ?? NOW }),
    sender: { address: 'alice@company.com', domain: 'company.com', senderClass, malformed: false },
    classification: { messageId, senderClass, intent: 'REQUEST', keywords: [], urgency: 'NONE' },
    priority: { messageId, score, band: overrides.band ?? 'MEDIUM', reasoning: [] },
    category: overrides.category ?? 'ACTION',
    routing: {
      escalated: overrides.escalated ?? false,
      deferred: overrides.deferred ?? false,
      autoRespond: false,
      reasons: []
    },
    threadDepth: 1,
    consolidatedCount: 1,
    degraded: false,
    replyWarranted: true,
    notes: [`note for ${messageId}`]
  };
}
