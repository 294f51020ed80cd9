import {
  BatchMetrics, DeferredEmailRow, DraftSubmission, EmailRecord, GuardrailFlag,
  QueueItem, SupersededRecord, TriageQueue, TriageResult, TriagedEmail
} from '../types/models';
import { DraftInput, EmailRecordInput, GuardrailFlagResponse, QueueItemResponse } from '../types/api';
import { GuardrailVerdict } from '../services/guardrails/types';
import { sanitizeEmailContent } from './validation';

/**
 * Transformation functions between wire payloads, database rows and model objects
 */

function parseStringArray(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((item): item is string => typeof item === 'string');
}

// Inbound transformations
export function emailInputToRecord(input: EmailRecordInput): EmailRecord {
  return {
    messageId: input.message_id,
    threadId: input.thread_id,
    sender: input.sender.trim(),
    displayName: input.display_name,
    subject: sanitizeEmailContent(input.subject),
    body: sanitizeEmailContent(input.body),
    receivedAt: input.received_at,
    labels: input.labels,
    recipients: input.recipients
  };
}

export function draftInputToSubmission(input: DraftInput): DraftSubmission {
  return {
    draftId: input.draft_id,
    body: input.body,
    recipients: input.recipients,
    cc: input.cc
  };
}

export function draftInputsToSubmissions(inputs: Record<string, DraftInput>): Record<string, DraftSubmission> {
  const drafts: Record<string, DraftSubmission> = {};
  for (const [messageId, input] of Object.entries(inputs)) {
    drafts[messageId] = draftInputToSubmission(input);
  }
  return drafts;
}

// Deferred mail transformations
export function recordToDeferredRow(record: EmailRecord, priorityScore: number, deferredAt: Date): DeferredEmailRow {
  return {
    message_id: record.messageId,
    thread_id: record.threadId,
    sender: record.sender,
    display_name: record.displayName,
    subject: record.subject,
    body: record.body,
    received_at: record.receivedAt.toISOString(),
    labels: JSON.stringify(record.labels),
    recipients: JSON.stringify(record.recipients ?? []),
    priority_score: priorityScore,
    deferred_at: deferredAt.toISOString()
  };
}

export function deferredRowToRecord(row: DeferredEmailRow): EmailRecord {
  return {
    messageId: row.message_id,
    threadId: row.thread_id,
    sender: row.sender,
    displayName: row.display_name,
    subject: row.subject,
    body: row.body,
    receivedAt: new Date(row.received_at),
    labels: parseStringArray(row.labels),
    recipients: parseStringArray(row.recipients)
  };
}

// Outbound transformations
export function flagToResponse(flag: GuardrailFlag): GuardrailFlagResponse {
  return {
    kind: flag.kind,
    severity: flag.severity,
    evidence: flag.evidence,
    matched_pattern: flag.matchedPattern
  };
}

export function verdictToResponse(verdict: GuardrailVerdict) {
  return {
    verdict: verdict.verdict,
    flags: verdict.flags.map(flagToResponse),
    failed_checks: verdict.failedChecks
  };
}

function supersededToResponse(record: SupersededRecord) {
  return {
    message_id: record.messageId,
    superseded_by: record.supersededBy,
    reason: record.reason
  };
}

export function triagedToResponse(triaged: TriagedEmail) {
  return {
    message_id: triaged.record.messageId,
    thread_id: triaged.record.threadId,
    sender_class: triaged.classification.senderClass,
    intent: triaged.classification.intent,
    keywords: triaged.classification.keywords,
    urgency: triaged.classification.urgency,
    priority_score: triaged.priority.score,
    priority_band: triaged.priority.band,
    category: triaged.category,
    escalated: triaged.routing.escalated,
    deferred: triaged.routing.deferred,
    auto_respond: triaged.routing.autoRespond,
    thread_depth: triaged.threadDepth,
    consolidated_count: triaged.consolidatedCount,
    degraded: triaged.degraded,
    reply_warranted: triaged.replyWarranted,
    notes: triaged.notes
  };
}

export function triageResultToResponse(result: TriageResult) {
  return {
    messages: result.triaged.map(triagedToResponse),
    superseded: result.superseded.map(supersededToResponse),
    degraded_count: result.degradedCount
  };
}

export function queueItemToResponse(item: QueueItem): QueueItemResponse {
  return {
    message_id: item.messageId,
    thread_id: item.threadId,
    subject: item.subject,
    received_at: item.receivedAt.toISOString(),
    priority_score: item.priorityScore,
    priority_band: item.priorityBand,
    category: item.category,
    sender_class: item.senderClass,
    intent: item.intent,
    draft_reference: item.draftReference ?? null,
    guardrail_flags: item.guardrailFlags.map(flagToResponse),
    decision: item.decision,
    deferred: item.deferred,
    auto_respond: item.autoRespond,
    clarification_questions: item.clarificationQuestions,
    reasoning: item.reasoning.map(entry => ({
      factor: entry.factor,
      contribution: entry.contribution,
      detail: entry.detail
    })),
    notes: item.notes
  };
}

export function queueToResponse(queue: TriageQueue) {
  const summary = queue.summary;
  return {
    summary: {
      total_processed: summary.totalProcessed,
      high_priority: summary.highPriority,
      medium_priority: summary.mediumPriority,
      low_priority: summary.lowPriority,
      drafts_created: summary.draftsCreated,
      needs_approval: summary.needsApproval,
      blocked: summary.blocked,
      follow_ups: summary.followUps,
      needs_clarification: summary.needsClarification,
      deferred: summary.deferred
    },
    top_n: queue.topItems.map(queueItemToResponse),
    blocked_items: queue.blockedItems.map(item => ({
      message_id: item.messageId,
      reason: item.reason,
      flags: item.flags.map(flagToResponse)
    })),
    deferred: queue.deferredItems.map(queueItemToResponse),
    superseded: queue.superseded.map(supersededToResponse),
    warnings: queue.warnings
  };
}

export function metricsToResponse(metrics: BatchMetrics) {
  return {
    total_emails: metrics.totalEmails,
    categories: metrics.categories,
    vip_emails: metrics.vipEmails,
    approval_required_count: metrics.approvalRequiredCount,
    blocked_count: metrics.blockedCount,
    auto_handled_count: metrics.autoHandledCount,
    time_saved_minutes: metrics.timeSavedMinutes
  };
}
