import { Category, DraftSubmission, GuardrailFlag, GuardrailKind } from '../../types/models';

export interface GuardrailContext {
  messageId?: string;
  category?: Category;
}

/**
 * A single independent safety check. Checks only ever add flags; none of
 * them can approve content or change another check's flags.
 */
export interface GuardrailCheck {
  readonly kind: GuardrailKind;
  inspect(draft: DraftSubmission, context: GuardrailContext): GuardrailFlag[];
}

export type GuardrailVerdictKind = 'APPROVE' | 'ESCALATE' | 'BLOCK';

export interface GuardrailVerdict {
  verdict: GuardrailVerdictKind;
  flags: GuardrailFlag[];
  failedChecks: GuardrailKind[];
}

export function draftRecipients(draft: DraftSubmission): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of [...draft.recipients, ...(draft.cc ?? [])]) {
    const key = (raw || '').trim().toLowerCase();
    if (key && !seen.has(key)) {
      seen.add(key);
      result.push(raw.trim());
    }
  }
  return result;
}
