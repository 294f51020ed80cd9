import Joi from 'joi';
import defaultRules from './defaultRules.json';
import {
  IntentGroup, SenderClass, Urgency,
  INTENT_GROUP_ORDER, SENDER_CLASSES, URGENCY_LEVELS
} from '../types/models';
import { domainMatches } from '../services/domain/DomainValidator';

export interface DomainLists {
  vipAddresses: string[];
  vipDomains: string[];
  internalDomains: string[];
  allowedDomains: string[];
  blockedDomains: string[];
  vendorDomains: string[];
  customerDomains: string[];
}

export interface ToneRules {
  aggressive: string[];
  liability: string[];
  slang: string[];
  severeTerms: string[];
  escalateAfter: number;
}

export interface TriageConfig {
  priorityThreshold: number;
  mediumThreshold: number;
  maxBatchSize: number;
  topN: number;
  minutesPerEmail: number;
  conflicts: {
    consolidateBursts: boolean;
    burstWindowMinutes: number;
  };
  domains: DomainLists;
  sender: {
    noReplyTokens: string[];
  };
  intent: {
    groups: Record<IntentGroup, string[]>;
    replyPrefixes: string[];
    spamKeywords: string[];
    spamDensityThreshold: number;
    spamMinHits: number;
  };
  urgency: {
    keywords: Record<string, number>;
    priorityLabels: string[];
    labelWeight: number;
    highThreshold: number;
  };
  weights: {
    sender: Record<SenderClass, number>;
    urgency: Record<Urgency, number>;
    requiresAction: number;
    agePointsPerDay: number;
    ageMaxPoints: number;
    threadPointsPerMessage: number;
    threadMaxPoints: number;
    highUrgencyFloor: boolean;
  };
  category: {
    legalKeywords: string[];
    financeKeywords: string[];
    waitingKeywords: string[];
  };
  dnd: {
    enabled: boolean;
    urgencyOverrideScore: number;
    autoResponder: boolean;
  };
  guardrails: {
    enabled: {
      pii: boolean;
      domain: boolean;
      tone: boolean;
      risk: boolean;
    };
    tone: ToneRules;
    risk: {
      maxRecipients: number;
      maxExternalRecipients: number;
    };
  };
}

/**
 * Raised when the configuration breaks its contract. Always surfaces at load
 * time, before any batch runs.
 */
export class ConfigurationError extends Error {
  public problems: string[];

  constructor(problems: string[]) {
    super(`Invalid triage configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

const keywordList = Joi.array().items(Joi.string().trim().lowercase().min(1)).required();
const domainList = Joi.array().items(Joi.string().trim().lowercase().min(1)).required();
const weight = Joi.number().required();
const nonNegative = Joi.number().min(0).required();

const recordOf = <K extends string>(keys: readonly K[], item: Joi.Schema): Joi.ObjectSchema =>
  Joi.object(Object.fromEntries(keys.map(key => [key, item]))).required();

export const triageConfigSchema = Joi.object<TriageConfig>({
  priorityThreshold: Joi.number().min(0).max(100).required(),
  mediumThreshold: Joi.number().min(0).max(100).required(),
  maxBatchSize: Joi.number().integer().min(1).required(),
  topN: Joi.number().integer().min(1).required(),
  minutesPerEmail: nonNegative,
  conflicts: Joi.object({
    consolidateBursts: Joi.boolean().required(),
    burstWindowMinutes: nonNegative
  }).required(),
  domains: Joi.object({
    vipAddresses: Joi.array().items(Joi.string().trim().lowercase().email({ tlds: false })).required(),
    vipDomains: domainList,
    internalDomains: domainList,
    allowedDomains: domainList,
    blockedDomains: domainList,
    vendorDomains: domainList,
    customerDomains: domainList
  }).required(),
  sender: Joi.object({
    noReplyTokens: keywordList
  }).required(),
  intent: Joi.object({
    groups: recordOf(INTENT_GROUP_ORDER, keywordList),
    replyPrefixes: keywordList,
    spamKeywords: keywordList,
    spamDensityThreshold: Joi.number().min(0).max(1).required(),
    spamMinHits: Joi.number().integer().min(1).required()
  }).required(),
  urgency: Joi.object({
    keywords: Joi.object().pattern(Joi.string().lowercase(), Joi.number().min(0)).required(),
    priorityLabels: Joi.array().items(Joi.string().trim().uppercase()).required(),
    labelWeight: nonNegative,
    highThreshold: Joi.number().greater(0).required()
  }).required(),
  weights: Joi.object({
    sender: recordOf(SENDER_CLASSES, weight),
    urgency: recordOf(URGENCY_LEVELS, weight),
    requiresAction: nonNegative,
    agePointsPerDay: nonNegative,
    ageMaxPoints: nonNegative,
    threadPointsPerMessage: nonNegative,
    threadMaxPoints: nonNegative,
    highUrgencyFloor: Joi.boolean().default(true)
  }).required(),
  category: Joi.object({
    legalKeywords: keywordList,
    financeKeywords: keywordList,
    waitingKeywords: keywordList
  }).required(),
  dnd: Joi.object({
    enabled: Joi.boolean().required(),
    urgencyOverrideScore: Joi.number().min(0).max(100).required(),
    autoResponder: Joi.boolean().required()
  }).required(),
  guardrails: Joi.object({
    enabled: Joi.object({
      pii: Joi.boolean().required(),
      domain: Joi.boolean().required(),
      tone: Joi.boolean().required(),
      risk: Joi.boolean().required()
    }).required(),
    tone: Joi.object({
      aggressive: keywordList,
      liability: keywordList,
      slang: keywordList,
      severeTerms: keywordList,
      escalateAfter: Joi.number().integer().min(1).required()
    }).required(),
    risk: Joi.object({
      maxRecipients: Joi.number().integer().min(1).required(),
      maxExternalRecipients: Joi.number().integer().min(0).required()
    }).required()
  }).required()
});

/**
 * Cross-field rules Joi cannot express: conflicting domain lists and the
 * monotonicity of the scoring weights.
 */
export function findContractViolations(config: TriageConfig): string[] {
  const problems: string[] = [];
  const blocked = config.domains.blockedDomains;
  const isBlocked = (domain: string) => blocked.some(entry => domainMatches(domain, entry));

  // Either side may be a subdomain of the other
  for (const domain of config.domains.allowedDomains) {
    if (blocked.some(entry => domainMatches(domain, entry) || domainMatches(entry, domain))) {
      problems.push(`domain ${domain} is both allowed and blocked`);
    }
  }
  for (const domain of config.domains.vipDomains) {
    if (isBlocked(domain)) problems.push(`VIP domain ${domain} is also blocked`);
  }
  for (const domain of config.domains.internalDomains) {
    if (isBlocked(domain)) problems.push(`internal domain ${domain} is also blocked`);
  }
  for (const address of config.domains.vipAddresses) {
    const domain = address.slice(address.lastIndexOf('@') + 1);
    if (isBlocked(domain)) problems.push(`VIP address ${address} belongs to blocked domain ${domain}`);
  }

  if (config.mediumThreshold > config.priorityThreshold) {
    problems.push('mediumThreshold must not exceed priorityThreshold');
  }

  const urgency = config.weights.urgency;
  if (!(urgency.NONE <= urgency.LOW && urgency.LOW <= urgency.HIGH)) {
    problems.push('urgency weights must be non-decreasing (NONE <= LOW <= HIGH)');
  }

  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a raw configuration object and return an immutable TriageConfig
 */
export function buildTriageConfig(input: unknown): TriageConfig {
  // Validation converts values in place; never let it touch a frozen config
  const { error, value } = triageConfigSchema.validate(structuredClone(input), { abortEarly: false });
  if (error) {
    throw new ConfigurationError(error.details.map(detail => detail.message));
  }
  if (!value) {
    throw new ConfigurationError(['configuration is empty']);
  }

  const problems = findContractViolations(value);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return deepFreeze(value);
}

function parseList(raw: string): string[] {
  return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Load configuration from the bundled rule tables, with scalar knobs and
 * domain lists overridable from the environment.
 */
export function loadTriageConfig(env: NodeJS.ProcessEnv = process.env, base: TriageConfig = defaultRules): TriageConfig {
  const raw: TriageConfig = structuredClone(base);

  if (env.PRIORITY_THRESHOLD) raw.priorityThreshold = parseFloat(env.PRIORITY_THRESHOLD);
  if (env.MEDIUM_PRIORITY_THRESHOLD) raw.mediumThreshold = parseFloat(env.MEDIUM_PRIORITY_THRESHOLD);
  if (env.MAX_EMAILS_TO_PROCESS) raw.maxBatchSize = parseInt(env.MAX_EMAILS_TO_PROCESS, 10);
  if (env.TOP_N) raw.topN = parseInt(env.TOP_N, 10);

  if (env.VIP_EMAILS) raw.domains.vipAddresses = parseList(env.VIP_EMAILS);
  if (env.VIP_DOMAINS) raw.domains.vipDomains = parseList(env.VIP_DOMAINS);
  if (env.INTERNAL_DOMAINS) raw.domains.internalDomains = parseList(env.INTERNAL_DOMAINS);
  if (env.ALLOWED_DOMAINS) raw.domains.allowedDomains = parseList(env.ALLOWED_DOMAINS);
  if (env.BLOCKED_DOMAINS) raw.domains.blockedDomains = parseList(env.BLOCKED_DOMAINS);

  if (env.DND_ENABLED) raw.dnd.enabled = env.DND_ENABLED === 'true';
  if (env.DND_URGENCY_OVERRIDE) raw.dnd.urgencyOverrideScore = parseFloat(env.DND_URGENCY_OVERRIDE);

  if (env.GUARDRAIL_PII) raw.guardrails.enabled.pii = env.GUARDRAIL_PII !== 'false';
  if (env.GUARDRAIL_DOMAIN) raw.guardrails.enabled.domain = env.GUARDRAIL_DOMAIN !== 'false';
  if (env.GUARDRAIL_TONE) raw.guardrails.enabled.tone = env.GUARDRAIL_TONE !== 'false';
  if (env.GUARDRAIL_RISK) raw.guardrails.enabled.risk = env.GUARDRAIL_RISK !== 'false';

  return buildTriageConfig(raw);
}

/**
 * Adding a VIP yields a new configuration; the original is left untouched
 */
export function withVipAddress(config: TriageConfig, address: string): TriageConfig {
  return buildTriageConfig({
    ...config,
    domains: { ...config.domains, vipAddresses: [...config.domains.vipAddresses, address] }
  });
}

export function withVipDomain(config: TriageConfig, domain: string): TriageConfig {
  return buildTriageConfig({
    ...config,
    domains: { ...config.domains, vipDomains: [...config.domains.vipDomains, domain] }
  });
}

/**
 * Return a new configuration with Do-Not-Disturb toggled
 */
export function withDnd(config: TriageConfig, enabled: boolean): TriageConfig {
  return buildTriageConfig({ ...config, dnd: { ...config.dnd, enabled } });
}

let cachedConfig: TriageConfig | null = null;

/**
 * Process-wide configuration, read once from the environment
 */
export function getTriageConfig(): TriageConfig {
  if (!cachedConfig) {
    cachedConfig = loadTriageConfig();
  }
  return cachedConfig;
}
