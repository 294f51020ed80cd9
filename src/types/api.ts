/**
 * Wire shapes accepted and returned by the HTTP layer (snake_case)
 */
import { Category } from './models';

export interface EmailRecordInput {
  message_id: string;
  thread_id: string;
  sender: string;
  display_name: string;
  subject: string;
  body: string;
  received_at: Date;
  labels: string[];
  recipients: string[];
}

export interface DraftInput {
  draft_id: string;
  body: string;
  recipients: string[];
  cc: string[];
}

export interface TriageRequest {
  emails: EmailRecordInput[];
  drafts: Record<string, DraftInput>;
  allow_oversized_batch: boolean;
}

export interface GuardrailCheckRequest {
  draft: DraftInput;
  category?: Category;
  message_id?: string;
}

export interface GuardrailFlagResponse {
  kind: string;
  severity: string;
  evidence: string;
  matched_pattern: string;
}

export interface QueueItemResponse {
  message_id: string;
  thread_id: string;
  subject: string;
  received_at: string;
  priority_score: number;
  priority_band: string;
  category: string;
  sender_class: string;
  intent: string;
  draft_reference: string | null;
  guardrail_flags: GuardrailFlagResponse[];
  decision: string;
  deferred: boolean;
  auto_respond: boolean;
  clarification_questions: string[];
  reasoning: Array<{ factor: string; contribution: number; detail: string }>;
  notes: string[];
}
