import { TriageConfig } from '../../config/triage';
import { DraftSubmission, GuardrailFlag, GuardrailKind } from '../../types/models';
import { DomainCheck } from './DomainCheck';
import { PiiCheck } from './PiiCheck';
import { RecipientRiskCheck } from './RecipientRiskCheck';
import { ToneCheck } from './ToneCheck';
import { GuardrailCheck, GuardrailContext, GuardrailVerdict } from './types';

/**
 * Runs every enabled check independently against an outbound draft and
 * unions their flags. A single BLOCK from any check blocks the draft. The
 * engine never rewrites content.
 */
export class GuardrailEngine {
  private readonly checks: readonly GuardrailCheck[];
  private readonly enabled: Record<GuardrailKind, boolean>;

  constructor(config: TriageConfig, checks?: GuardrailCheck[]) {
    this.enabled = {
      PII: config.guardrails.enabled.pii,
      DOMAIN: config.guardrails.enabled.domain,
      TONE: config.guardrails.enabled.tone,
      RISK: config.guardrails.enabled.risk
    };
    this.checks = checks ?? [
      new PiiCheck(),
      new DomainCheck(config),
      new ToneCheck(config.guardrails.tone),
      new RecipientRiskCheck(config)
    ];
  }

  evaluate(draft: DraftSubmission, context: GuardrailContext = {}): GuardrailVerdict {
    const flags: GuardrailFlag[] = [];
    const failedChecks: GuardrailKind[] = [];

    for (const check of this.checks) {
      if (!this.enabled[check.kind]) continue;

      try {
        flags.push(...check.inspect(draft, context));
      } catch (error) {
        // A detector failure degrades to "no flag" for that check only
        failedChecks.push(check.kind);
        console.warn(`Guardrail ${check.kind} check failed for ${context.messageId ?? draft.draftId}:`, error);
      }
    }

    return {
      verdict: GuardrailEngine.verdictFor(flags),
      flags,
      failedChecks
    };
  }

  getEnabledKinds(): GuardrailKind[] {
    return this.checks.filter(check => this.enabled[check.kind]).map(check => check.kind);
  }

  static verdictFor(flags: readonly GuardrailFlag[]): GuardrailVerdict['verdict'] {
    if (flags.some(flag => flag.severity === 'BLOCK')) return 'BLOCK';
    if (flags.length > 0) return 'ESCALATE';
    return 'APPROVE';
  }
}
