import { ToneRules } from '../../config/triage';
import { DraftSubmission, GuardrailFlag, GuardrailSeverity } from '../../types/models';
import { KeywordMatcher } from '../rules/KeywordMatcher';
import { GuardrailCheck } from './types';

type ToneGroup = 'aggressive' | 'liability' | 'slang';

const TONE_GROUPS: readonly ToneGroup[] = ['aggressive', 'liability', 'slang'];

/**
 * Aggressive wording, liability-creating promises and unprofessional slang.
 * Matches warn by default; severe terms block outright, and once the number
 * of distinct matches reaches `escalateAfter` every tone flag is escalated.
 */
export class ToneCheck implements GuardrailCheck {
  readonly kind = 'TONE' as const;
  private readonly matchers: Record<ToneGroup, KeywordMatcher>;
  private readonly severeTerms: ReadonlySet<string>;
  private readonly escalateAfter: number;

  constructor(rules: ToneRules) {
    this.matchers = {
      aggressive: new KeywordMatcher(rules.aggressive),
      liability: new KeywordMatcher(rules.liability),
      slang: new KeywordMatcher(rules.slang)
    };
    this.severeTerms = new Set(rules.severeTerms.map(term => term.toLowerCase()));
    this.escalateAfter = rules.escalateAfter;
  }

  inspect(draft: DraftSubmission): GuardrailFlag[] {
    const text = (draft.body || '').toLowerCase();
    const flags: GuardrailFlag[] = [];

    for (const group of TONE_GROUPS) {
      for (const term of this.matchers[group].matchedTerms(text)) {
        const severity: GuardrailSeverity = this.severeTerms.has(term) ? 'BLOCK' : 'WARN';
        flags.push({
          kind: 'TONE',
          severity,
          evidence: `"${term}" (${group} language)`,
          matchedPattern: `${group}:${term}`
        });
      }
    }

    if (flags.length >= this.escalateAfter) {
      return flags.map((flag): GuardrailFlag => ({ ...flag, severity: 'BLOCK' }));
    }
    return flags;
  }
}
