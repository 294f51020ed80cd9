import { TriageConfig } from '../../config/triage';
import { Category, CATEGORY_PRECEDENCE, EmailRecord, Intent } from '../../types/models';
import { KeywordMatcher, normalizeText } from '../rules/KeywordMatcher';
import { Rule, RuleEngine } from '../rules/RuleEngine';
import { ACTION_INTENTS } from './PriorityScorer';

interface CategoryFacts {
  intent: Intent;
  legalTerms: string[];
  financeTerms: string[];
  waitingTerms: string[];
}

export interface CategoryAssignment {
  category: Category;
  matchedRule: string;
  legalTerms: string[];
  financeTerms: string[];
}

/**
 * Exactly one category per message, chosen by the fixed precedence
 * LEGAL > FINANCE > SPAM > ACTION > WAITING > FYI.
 *
 * Legal and finance detection lives here and nowhere else; it deliberately
 * errs towards false positives since both categories force escalation.
 */
export class Categorizer {
  private readonly legalMatcher: KeywordMatcher;
  private readonly financeMatcher: KeywordMatcher;
  private readonly waitingMatcher: KeywordMatcher;
  private readonly engine: RuleEngine<CategoryFacts, Category>;

  constructor(config: TriageConfig) {
    this.legalMatcher = new KeywordMatcher(config.category.legalKeywords);
    this.financeMatcher = new KeywordMatcher(config.category.financeKeywords);
    this.waitingMatcher = new KeywordMatcher(config.category.waitingKeywords);
    this.engine = new RuleEngine(this.buildRules());
  }

  categorize(intent: Intent, record: Pick<EmailRecord, 'subject' | 'body'>): CategoryAssignment {
    const text = normalizeText(record.subject, record.body);
    const facts: CategoryFacts = {
      intent,
      legalTerms: this.legalMatcher.matchedTerms(text),
      financeTerms: this.financeMatcher.matchedTerms(text),
      waitingTerms: this.waitingMatcher.matchedTerms(text)
    };

    const match = this.engine.evaluate(facts);
    return {
      category: match ? match.result : 'FYI',
      matchedRule: match ? match.ruleId : 'default_fyi',
      legalTerms: facts.legalTerms,
      financeTerms: facts.financeTerms
    };
  }

  private buildRules(): Rule<CategoryFacts, Category>[] {
    const priorityOf = (category: Category): number =>
      (CATEGORY_PRECEDENCE.length - CATEGORY_PRECEDENCE.indexOf(category)) * 10;

    return [
      { id: 'legal_terms', result: 'LEGAL', priority: priorityOf('LEGAL'), when: f => f.legalTerms.length > 0 },
      { id: 'finance_terms', result: 'FINANCE', priority: priorityOf('FINANCE'), when: f => f.financeTerms.length > 0 },
      { id: 'spam_intent', result: 'SPAM', priority: priorityOf('SPAM'), when: f => f.intent === 'SPAM' },
      { id: 'action_intent', result: 'ACTION', priority: priorityOf('ACTION'), when: f => ACTION_INTENTS.has(f.intent) },
      { id: 'waiting_terms', result: 'WAITING', priority: priorityOf('WAITING'), when: f => f.waitingTerms.length > 0 }
    ];
  }
}
