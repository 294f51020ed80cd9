import { TriageConfig } from '../../config/triage';
import { Category, RoutingDecision, SenderClass } from '../../types/models';

export interface RoutingInput {
  messageId: string;
  category: Category;
  senderClass: SenderClass;
  priorityScore: number;
}

export interface RoutingPolicy {
  id: string;
  apply(input: RoutingInput, current: RoutingDecision): RoutingDecision;
}

const ESCALATED_CATEGORIES: ReadonlySet<Category> = new Set<Category>(['LEGAL', 'FINANCE']);

/**
 * Legal and finance mail always goes to a human, whatever its score
 */
export const legalFinanceEscalation: RoutingPolicy = {
  id: 'legal_finance_escalation',
  apply(input, current) {
    if (!ESCALATED_CATEGORIES.has(input.category)) {
      return current;
    }
    return {
      ...current,
      escalated: true,
      reasons: [...current.reasons, `${input.category} content requires approval`]
    };
  }
};

export function doNotDisturb(config: TriageConfig): RoutingPolicy {
  return {
    id: 'do_not_disturb',
    apply(input, current) {
      if (!config.dnd.enabled) {
        return current;
      }
      // An escalated item is never silently suppressed
      if (current.escalated) {
        return { ...current, reasons: [...current.reasons, 'DND bypassed: escalated item'] };
      }
      if (input.senderClass === 'VIP') {
        return { ...current, reasons: [...current.reasons, 'DND bypassed: VIP sender'] };
      }
      if (input.priorityScore > config.dnd.urgencyOverrideScore) {
        return {
          ...current,
          reasons: [...current.reasons, `DND bypassed: score ${input.priorityScore} > ${config.dnd.urgencyOverrideScore}`]
        };
      }
      return {
        ...current,
        deferred: true,
        autoRespond: config.dnd.autoResponder,
        reasons: [...current.reasons, 'Deferred by Do-Not-Disturb']
      };
    }
  };
}

/**
 * Small ordered policy chain applied after categorization
 */
export class EdgeCaseRouter {
  private readonly policies: readonly RoutingPolicy[];

  constructor(config: TriageConfig, policies?: RoutingPolicy[]) {
    this.policies = policies ?? [legalFinanceEscalation, doNotDisturb(config)];
  }

  route(input: RoutingInput): RoutingDecision {
    const initial: RoutingDecision = { escalated: false, deferred: false, autoRespond: false, reasons: [] };
    return this.policies.reduce((decision, policy) => policy.apply(input, decision), initial);
  }

  getPolicyIds(): string[] {
    return this.policies.map(policy => policy.id);
  }
}
