import { TriageConfig } from '../../config/triage';
import { SenderClass, SenderProfile } from '../../types/models';
import { DomainValidator, ParsedAddress } from '../domain/DomainValidator';
import { Rule, RuleEngine } from '../rules/RuleEngine';

export interface SenderClassification {
  profile: SenderProfile;
  ruleId: string;
}

/**
 * Maps a sender address to a sender class. Pure function of the address and
 * the configured domain tables; never throws.
 */
export class SenderClassifier {
  private readonly validator: DomainValidator;
  private readonly noReplyTokens: readonly string[];
  private readonly engine: RuleEngine<ParsedAddress | null, SenderClass>;

  constructor(config: TriageConfig) {
    this.validator = new DomainValidator(config.domains);
    this.noReplyTokens = config.sender.noReplyTokens;
    this.engine = new RuleEngine(this.buildRules());
  }

  classify(sender: string): SenderProfile {
    return this.classifyWithRule(sender).profile;
  }

  classifyWithRule(sender: string): SenderClassification {
    const parsed = this.validator.parseAddress(sender);
    const match = this.engine.evaluate(parsed);
    const senderClass = match ? match.result : 'CUSTOMER';

    return {
      profile: {
        address: parsed?.address ?? (sender || '').trim().toLowerCase(),
        domain: parsed?.domain ?? '',
        senderClass,
        malformed: parsed === null
      },
      ruleId: match ? match.ruleId : 'external_default'
    };
  }

  private buildRules(): Rule<ParsedAddress | null, SenderClass>[] {
    const v = this.validator;
    const parsedWith = (check: (p: ParsedAddress) => boolean) =>
      (p: ParsedAddress | null): boolean => p !== null && check(p);

    return [
      { id: 'malformed_address', result: 'SPAM_SUSPECT', priority: 100, when: p => p === null },
      { id: 'vip_address', result: 'VIP', priority: 90, when: parsedWith(p => v.isVipAddress(p.address)) },
      { id: 'vip_domain', result: 'VIP', priority: 85, when: parsedWith(p => v.isVipDomain(p.domain)) },
      {
        id: 'no_reply_local_part',
        result: 'NO_REPLY',
        priority: 80,
        when: parsedWith(p => this.noReplyTokens.some(token => p.localPart.includes(token)))
      },
      { id: 'blocked_domain', result: 'SPAM_SUSPECT', priority: 70, when: parsedWith(p => v.isBlocked(p.domain)) },
      { id: 'vendor_domain', result: 'VENDOR', priority: 60, when: parsedWith(p => v.isVendor(p.domain)) },
      { id: 'customer_domain', result: 'CUSTOMER', priority: 55, when: parsedWith(p => v.isCustomer(p.domain)) },
      { id: 'internal_domain', result: 'TEAM', priority: 50, when: parsedWith(p => v.isInternal(p.domain)) }
    ];
  }
}
