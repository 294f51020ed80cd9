import { TriageConfig } from '../../config/triage';
import { DraftSubmission, GuardrailFlag } from '../../types/models';
import { DomainValidator } from '../domain/DomainValidator';
import { GuardrailCheck, draftRecipients } from './types';

/**
 * Recipient domains against the allow and block lists. Anything outside the
 * allow list is at least an approval signal; a blocked domain stops the send.
 */
export class DomainCheck implements GuardrailCheck {
  readonly kind = 'DOMAIN' as const;
  private readonly validator: DomainValidator;

  constructor(config: TriageConfig) {
    this.validator = new DomainValidator(config.domains);
  }

  inspect(draft: DraftSubmission): GuardrailFlag[] {
    const flags: GuardrailFlag[] = [];
    const seenDomains = new Set<string>();

    for (const recipient of draftRecipients(draft)) {
      const parsed = this.validator.parseAddress(recipient);
      if (!parsed) {
        flags.push({
          kind: 'DOMAIN',
          severity: 'WARN',
          evidence: `unparseable recipient "${recipient}"`,
          matchedPattern: 'invalid_address'
        });
        continue;
      }

      if (seenDomains.has(parsed.domain)) continue;
      seenDomains.add(parsed.domain);

      if (this.validator.isBlocked(parsed.domain)) {
        flags.push({
          kind: 'DOMAIN',
          severity: 'BLOCK',
          evidence: `recipient domain ${parsed.domain} is blocked`,
          matchedPattern: 'blocked_domain'
        });
      } else if (!this.validator.isAllowListed(parsed.domain)) {
        flags.push({
          kind: 'DOMAIN',
          severity: 'WARN',
          evidence: `external recipient domain ${parsed.domain}`,
          matchedPattern: 'external_domain'
        });
      }
    }

    return flags;
  }
}
