/**
 * Core data models for the inbox triage pipeline
 */

export const SENDER_CLASSES = ['VIP', 'TEAM', 'VENDOR', 'CUSTOMER', 'NO_REPLY', 'SPAM_SUSPECT'] as const;
export type SenderClass = typeof SENDER_CLASSES[number];

export const INTENTS = [
  'QUESTION', 'REQUEST', 'MEETING', 'COMPLAINT', 'NOTIFICATION',
  'REPLY_NEEDED', 'INFORMATIONAL', 'SPAM'
] as const;
export type Intent = typeof INTENTS[number];

// Keyword groups are scanned in this order; the first group with a hit wins
export const INTENT_GROUP_ORDER = ['MEETING', 'COMPLAINT', 'QUESTION', 'REQUEST', 'NOTIFICATION'] as const;
export type IntentGroup = typeof INTENT_GROUP_ORDER[number];

export const URGENCY_LEVELS = ['NONE', 'LOW', 'HIGH'] as const;
export type Urgency = typeof URGENCY_LEVELS[number];

// Highest precedence first
export const CATEGORY_PRECEDENCE = ['LEGAL', 'FINANCE', 'SPAM', 'ACTION', 'WAITING', 'FYI'] as const;
export type Category = typeof CATEGORY_PRECEDENCE[number];

export type PriorityBand = 'HIGH' | 'MEDIUM' | 'LOW';

export const GUARDRAIL_KINDS = ['PII', 'DOMAIN', 'TONE', 'RISK'] as const;
export type GuardrailKind = typeof GUARDRAIL_KINDS[number];
export type GuardrailSeverity = 'WARN' | 'BLOCK';

export type QueueDecision = 'AUTO_QUEUED' | 'NEEDS_APPROVAL' | 'BLOCKED' | 'NEEDS_CLARIFICATION';

/**
 * Normalized inbound message handed over by the ingestion collaborator.
 * Never mutated by the pipeline.
 */
export interface EmailRecord {
  messageId: string;
  threadId: string;
  sender: string;
  displayName: string;
  subject: string;
  body: string;
  receivedAt: Date;
  labels: string[];
  recipients?: string[];
}

export interface SenderProfile {
  address: string;
  domain: string;
  senderClass: SenderClass;
  malformed: boolean;
}

export interface IntentDetection {
  intent: Intent;
  keywords: string[];
  urgency: Urgency;
  urgencyKeywords: string[];
  spamHits: number;
}

export interface ClassificationResult {
  messageId: string;
  senderClass: SenderClass;
  intent: Intent;
  keywords: string[];
  urgency: Urgency;
}

export type ScoreFactor = 'sender_class' | 'urgency' | 'requires_action' | 'message_age' | 'thread_depth' | 'urgency_floor';

export interface ScoreContribution {
  factor: ScoreFactor;
  contribution: number;
  detail: string;
}

export interface PriorityScore {
  messageId: string;
  score: number;
  band: PriorityBand;
  reasoning: ScoreContribution[];
}

export interface GuardrailFlag {
  kind: GuardrailKind;
  severity: GuardrailSeverity;
  evidence: string;
  matchedPattern: string;
}

/**
 * Outbound draft produced by the drafting collaborator
 */
export interface DraftSubmission {
  draftId: string;
  body: string;
  recipients: string[];
  cc?: string[];
}

/**
 * Output of the conflict-resolution barrier: one logical message per thread
 */
export interface ResolvedEmail {
  record: EmailRecord;
  threadDepth: number;
  consolidatedCount: number;
  supersededIds: string[];
}

export interface SupersededRecord {
  messageId: string;
  supersededBy: string;
  reason: 'thread' | 'burst';
}

export interface RoutingDecision {
  escalated: boolean;
  deferred: boolean;
  autoRespond: boolean;
  reasons: string[];
}

/**
 * Everything phase one knows about a message before any draft exists
 */
export interface TriagedEmail {
  record: EmailRecord;
  sender: SenderProfile;
  classification: ClassificationResult;
  priority: PriorityScore;
  category: Category;
  routing: RoutingDecision;
  threadDepth: number;
  consolidatedCount: number;
  degraded: boolean;
  replyWarranted: boolean;
  notes: string[];
}

export interface TriageResult {
  triaged: TriagedEmail[];
  superseded: SupersededRecord[];
  degradedCount: number;
}

export interface QueueItem {
  messageId: string;
  threadId: string;
  subject: string;
  receivedAt: Date;
  priorityScore: number;
  priorityBand: PriorityBand;
  category: Category;
  senderClass: SenderClass;
  intent: Intent;
  draftReference?: string;
  guardrailFlags: GuardrailFlag[];
  decision: QueueDecision;
  deferred: boolean;
  autoRespond: boolean;
  clarificationQuestions: string[];
  reasoning: ScoreContribution[];
  notes: string[];
}

export interface BlockedItem {
  messageId: string;
  reason: string;
  flags: GuardrailFlag[];
}

export interface QueueSummary {
  totalProcessed: number;
  highPriority: number;
  mediumPriority: number;
  lowPriority: number;
  draftsCreated: number;
  needsApproval: number;
  blocked: number;
  followUps: number;
  needsClarification: number;
  deferred: number;
}

export interface TriageQueue {
  summary: QueueSummary;
  topItems: QueueItem[];
  blockedItems: BlockedItem[];
  deferredItems: QueueItem[];
  superseded: SupersededRecord[];
  warnings: string[];
}

export interface BatchMetrics {
  totalEmails: number;
  categories: Record<Category, number>;
  vipEmails: number;
  approvalRequiredCount: number;
  blockedCount: number;
  autoHandledCount: number;
  timeSavedMinutes: number;
}

export interface BatchOutcome {
  queue: TriageQueue;
  metrics: BatchMetrics;
}

// Database row interface (for SQLite storage of deferred mail)
export interface DeferredEmailRow {
  message_id: string;
  thread_id: string;
  sender: string;
  display_name: string;
  subject: string;
  body: string;
  received_at: string;
  labels: string; // JSON string
  recipients: string; // JSON string
  priority_score: number;
  deferred_at: string;
}
