import { TriageConfig } from '../../config/triage';
import { Category, DraftSubmission, GuardrailFlag } from '../../types/models';
import { DomainValidator } from '../domain/DomainValidator';
import { GuardrailCheck, GuardrailContext, draftRecipients } from './types';

const SENSITIVE_CATEGORIES: ReadonlySet<Category> = new Set<Category>(['LEGAL', 'FINANCE']);

/**
 * Reply-all exposure: wide recipient lists, many external addresses, and
 * sensitive categories going outside the organisation
 */
export class RecipientRiskCheck implements GuardrailCheck {
  readonly kind = 'RISK' as const;
  private readonly validator: DomainValidator;
  private readonly maxRecipients: number;
  private readonly maxExternalRecipients: number;

  constructor(config: TriageConfig) {
    this.validator = new DomainValidator(config.domains);
    this.maxRecipients = config.guardrails.risk.maxRecipients;
    this.maxExternalRecipients = config.guardrails.risk.maxExternalRecipients;
  }

  inspect(draft: DraftSubmission, context: GuardrailContext): GuardrailFlag[] {
    const recipients = draftRecipients(draft);
    const external = recipients.filter(recipient => {
      const parsed = this.validator.parseAddress(recipient);
      return !parsed || !this.validator.isAllowListed(parsed.domain);
    });
    const flags: GuardrailFlag[] = [];

    if (recipients.length > this.maxRecipients) {
      flags.push({
        kind: 'RISK',
        severity: 'WARN',
        evidence: `${recipients.length} recipients (limit ${this.maxRecipients})`,
        matchedPattern: 'recipient_count'
      });
    }

    if (external.length > this.maxExternalRecipients) {
      flags.push({
        kind: 'RISK',
        severity: 'BLOCK',
        evidence: `${external.length} external recipients (limit ${this.maxExternalRecipients})`,
        matchedPattern: 'external_recipient_count'
      });
    }

    if (context.category && SENSITIVE_CATEGORIES.has(context.category) && external.length > 0) {
      flags.push({
        kind: 'RISK',
        severity: 'WARN',
        evidence: `${context.category} reply to ${external.length} external recipient(s)`,
        matchedPattern: 'sensitive_external_reply'
      });
    }

    return flags;
  }
}
