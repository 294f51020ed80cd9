import { TriageConfig } from '../../config/triage';
import {
  EmailRecord, Intent, IntentDetection, IntentGroup, Urgency, INTENT_GROUP_ORDER
} from '../../types/models';
import { KeywordMatcher, countWords, normalizeText } from '../rules/KeywordMatcher';
import { Rule, RuleEngine } from '../rules/RuleEngine';

interface IntentFacts {
  groupTerms: Record<IntentGroup, string[]>;
  spamTerms: string[];
  spamDetected: boolean;
  isReply: boolean;
}

/**
 * Deterministic keyword engine: intent from ordered keyword groups, urgency
 * from a separate weighted vocabulary plus priority labels on the record
 */
export class IntentDetector {
  private readonly config: TriageConfig;
  private readonly groupMatchers: Record<IntentGroup, KeywordMatcher>;
  private readonly spamMatcher: KeywordMatcher;
  private readonly urgencyMatcher: KeywordMatcher;
  private readonly urgencyWeights: Map<string, number>;
  private readonly engine: RuleEngine<IntentFacts, Intent>;

  constructor(config: TriageConfig) {
    this.config = config;
    const groups = config.intent.groups;
    this.groupMatchers = {
      MEETING: new KeywordMatcher(groups.MEETING),
      COMPLAINT: new KeywordMatcher(groups.COMPLAINT),
      QUESTION: new KeywordMatcher(groups.QUESTION),
      REQUEST: new KeywordMatcher(groups.REQUEST),
      NOTIFICATION: new KeywordMatcher(groups.NOTIFICATION)
    };
    this.spamMatcher = new KeywordMatcher(config.intent.spamKeywords);
    this.urgencyWeights = new Map(
      Object.entries(config.urgency.keywords).map(([term, weight]) => [term.toLowerCase(), weight])
    );
    this.urgencyMatcher = new KeywordMatcher(Array.from(this.urgencyWeights.keys()));
    this.engine = new RuleEngine(this.buildRules());
  }

  detect(record: Pick<EmailRecord, 'subject' | 'body' | 'labels'>): IntentDetection {
    const text = normalizeText(record.subject, record.body);
    const facts = this.collectFacts(text, record.subject);
    const match = this.engine.evaluate(facts);
    const intent: Intent = match ? match.result : 'INFORMATIONAL';

    const { urgency, urgencyKeywords } = this.detectUrgency(text, record.labels);

    let intentTerms: string[] = [];
    if (intent === 'SPAM') {
      intentTerms = facts.spamTerms;
    } else if (isIntentGroup(intent)) {
      intentTerms = facts.groupTerms[intent];
    }

    return {
      intent,
      keywords: Array.from(new Set([...intentTerms, ...urgencyKeywords])).sort(),
      urgency,
      urgencyKeywords,
      spamHits: this.spamMatcher.totalHits(text)
    };
  }

  /**
   * Urgency never influences the intent; it only feeds the scorer
   */
  detectUrgency(text: string, labels: readonly string[]): { urgency: Urgency; urgencyKeywords: string[] } {
    const urgencyKeywords = this.urgencyMatcher.matchedTerms(text).sort();
    let score = urgencyKeywords.reduce((sum, term) => sum + (this.urgencyWeights.get(term) ?? 0), 0);

    const priorityLabels = this.config.urgency.priorityLabels;
    if (labels.some(label => priorityLabels.includes(label.toUpperCase()))) {
      score += this.config.urgency.labelWeight;
    }

    let urgency: Urgency = 'NONE';
    if (score >= this.config.urgency.highThreshold) {
      urgency = 'HIGH';
    } else if (score > 0) {
      urgency = 'LOW';
    }
    return { urgency, urgencyKeywords };
  }

  private collectFacts(text: string, subject: string): IntentFacts {
    const groupTerms: Record<IntentGroup, string[]> = {
      MEETING: this.groupMatchers.MEETING.matchedTerms(text),
      COMPLAINT: this.groupMatchers.COMPLAINT.matchedTerms(text),
      QUESTION: this.groupMatchers.QUESTION.matchedTerms(text),
      REQUEST: this.groupMatchers.REQUEST.matchedTerms(text),
      NOTIFICATION: this.groupMatchers.NOTIFICATION.matchedTerms(text)
    };

    const spamTerms = this.spamMatcher.matchedTerms(text);
    const spamHits = this.spamMatcher.totalHits(text);
    const words = Math.max(countWords(text), 1);
    const spamDetected = spamHits >= this.config.intent.spamMinHits
      && spamHits / words >= this.config.intent.spamDensityThreshold;

    const normalizedSubject = (subject || '').trim().toLowerCase();
    const isReply = this.config.intent.replyPrefixes.some(prefix => normalizedSubject.startsWith(prefix));

    return { groupTerms, spamTerms, spamDetected, isReply };
  }

  private buildRules(): Rule<IntentFacts, Intent>[] {
    const groupRules: Rule<IntentFacts, Intent>[] = INTENT_GROUP_ORDER.map((group, index) => ({
      id: `group_${group.toLowerCase()}`,
      result: group,
      priority: 100 - index * 10,
      when: (facts: IntentFacts) => facts.groupTerms[group].length > 0
    }));

    return [
      ...groupRules,
      { id: 'spam_density', result: 'SPAM', priority: 20, when: facts => facts.spamDetected },
      { id: 'unanswered_reply', result: 'REPLY_NEEDED', priority: 10, when: facts => facts.isReply }
    ];
  }
}

function isIntentGroup(intent: Intent): intent is IntentGroup {
  return (INTENT_GROUP_ORDER as readonly string[]).includes(intent);
}
