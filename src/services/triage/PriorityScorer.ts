import { TriageConfig } from '../../config/triage';
import {
  Intent, PriorityBand, PriorityScore, ScoreContribution, SenderClass, Urgency
} from '../../types/models';

export const ACTION_INTENTS: ReadonlySet<Intent> = new Set<Intent>([
  'QUESTION', 'REQUEST', 'MEETING', 'COMPLAINT', 'REPLY_NEEDED'
]);

export interface ScoringInput {
  messageId: string;
  senderClass: SenderClass;
  intent: Intent;
  urgency: Urgency;
  receivedAt: Date;
  threadDepth: number;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Composite 0-100 priority score. Each factor is non-decreasing in its input,
 * so raising one factor while holding the rest never lowers the score.
 */
export class PriorityScorer {
  private readonly config: TriageConfig;

  constructor(config: TriageConfig) {
    this.config = config;
  }

  score(input: ScoringInput, now: Date): PriorityScore {
    const weights = this.config.weights;
    const requiresAction = ACTION_INTENTS.has(input.intent);
    const reasoning: ScoreContribution[] = [];

    reasoning.push({
      factor: 'sender_class',
      contribution: weights.sender[input.senderClass],
      detail: `sender class ${input.senderClass}`
    });

    reasoning.push({
      factor: 'urgency',
      contribution: weights.urgency[input.urgency],
      detail: `urgency ${input.urgency}`
    });

    reasoning.push({
      factor: 'requires_action',
      contribution: requiresAction ? weights.requiresAction : 0,
      detail: requiresAction ? `intent ${input.intent} requires action` : `intent ${input.intent} needs no action`
    });

    // Only unanswered action items age upwards
    const ageHours = this.ageInHours(input.receivedAt, now);
    const agePoints = requiresAction
      ? Math.min(weights.ageMaxPoints, Math.floor((ageHours / 24) * weights.agePointsPerDay))
      : 0;
    reasoning.push({
      factor: 'message_age',
      contribution: agePoints,
      detail: requiresAction ? `${Math.floor(ageHours)}h waiting for action` : 'not an action item'
    });

    const depth = Math.max(1, Math.floor(input.threadDepth));
    reasoning.push({
      factor: 'thread_depth',
      contribution: Math.min(weights.threadMaxPoints, (depth - 1) * weights.threadPointsPerMessage),
      detail: `thread depth ${depth}`
    });

    const total = reasoning.reduce((sum, entry) => sum + entry.contribution, 0);
    let score = Math.max(0, Math.min(100, Math.round(total)));

    // High urgency never lands below the MEDIUM band
    if (weights.highUrgencyFloor && input.urgency === 'HIGH' && score < this.config.mediumThreshold) {
      reasoning.push({
        factor: 'urgency_floor',
        contribution: this.config.mediumThreshold - score,
        detail: 'high urgency lifted to the medium band'
      });
      score = this.config.mediumThreshold;
    }

    return {
      messageId: input.messageId,
      score,
      band: this.band(score),
      reasoning
    };
  }

  band(score: number): PriorityBand {
    if (score >= this.config.priorityThreshold) return 'HIGH';
    if (score >= this.config.mediumThreshold) return 'MEDIUM';
    return 'LOW';
  }

  /**
   * Render the reasoning trail as a one-line explanation
   */
  explain(priority: PriorityScore): string {
    const parts = priority.reasoning
      .filter(entry => entry.contribution !== 0)
      .map(entry => `${entry.detail} (${entry.contribution > 0 ? '+' : ''}${entry.contribution})`);
    const body = parts.length > 0 ? parts.join(', ') : 'no scoring factors';
    return `Score ${priority.score}/100 (${priority.band}): ${body}`;
  }

  private ageInHours(receivedAt: Date, now: Date): number {
    const elapsed = now.getTime() - receivedAt.getTime();
    if (!Number.isFinite(elapsed) || elapsed <= 0) {
      return 0;
    }
    return elapsed / HOUR_MS;
  }
}
