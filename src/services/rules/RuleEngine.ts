/**
 * Ordered rule tables evaluated by a single routine, so precedence lives in
 * data (the priority of each rule) rather than in nested if/else chains.
 */

export interface Rule<TInput, TResult> {
  id: string;
  result: TResult;
  priority: number;
  when: (input: TInput) => boolean;
}

export interface RuleMatch<TResult> {
  ruleId: string;
  result: TResult;
  priority: number;
}

export class RuleEngine<TInput, TResult> {
  private readonly rules: ReadonlyArray<Rule<TInput, TResult>>;

  constructor(rules: Rule<TInput, TResult>[]) {
    // Stable sort: equal priorities keep declaration order
    this.rules = rules
      .map((rule, index) => ({ rule, index }))
      .sort((a, b) => b.rule.priority - a.rule.priority || a.index - b.index)
      .map(entry => entry.rule);
  }

  /**
   * Highest-priority rule whose predicate holds, or null when none does
   */
  evaluate(input: TInput): RuleMatch<TResult> | null {
    for (const rule of this.rules) {
      if (rule.when(input)) {
        return { ruleId: rule.id, result: rule.result, priority: rule.priority };
      }
    }
    return null;
  }

  /**
   * Every matching rule, in precedence order
   */
  evaluateAll(input: TInput): RuleMatch<TResult>[] {
    return this.rules
      .filter(rule => rule.when(input))
      .map(rule => ({ ruleId: rule.id, result: rule.result, priority: rule.priority }));
  }

  /**
   * Result of the highest-priority match, falling back when nothing matches
   */
  resolve(input: TInput, fallback: TResult): TResult {
    const match = this.evaluate(input);
    return match ? match.result : fallback;
  }

  getRuleIds(): string[] {
    return this.rules.map(rule => rule.id);
  }
}
