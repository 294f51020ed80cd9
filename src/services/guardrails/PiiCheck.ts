import { DraftSubmission, GuardrailFlag } from '../../types/models';
import { GuardrailCheck } from './types';

interface PiiPattern {
  name: string;
  regex: RegExp;
  accept?: (match: RegExpExecArray) => boolean;
  redact: (match: RegExpExecArray) => string;
}

const MASK = '*';

export function maskAllButLast(value: string, visible: number): string {
  if (value.length <= visible) return MASK.repeat(value.length);
  return MASK.repeat(value.length - visible) + value.slice(-visible);
}

export function maskAllButFirst(value: string, visible: number): string {
  if (value.length <= visible) return MASK.repeat(value.length);
  return value.slice(0, visible) + MASK.repeat(value.length - visible);
}

export function luhnValid(digits: string): boolean {
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if (double) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    double = !double;
  }
  return digits.length > 0 && sum % 10 === 0;
}

/**
 * Shannon entropy in bits per character
 */
export function shannonEntropy(value: string): number {
  if (value.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const char of value) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / value.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

// Earlier patterns win when spans overlap
export const PII_PATTERNS: readonly PiiPattern[] = [
  {
    name: 'ssn',
    regex: /\b\d{3}-\d{2}-\d{4}\b/g,
    redact: m => maskAllButLast(m[0], 4)
  },
  {
    name: 'credit_card',
    regex: /\b(?:\d[ -]?){12,18}\d\b/g,
    accept: m => {
      const digits = m[0].replace(/\D/g, '');
      return digits.length >= 13 && digits.length <= 19 && luhnValid(digits);
    },
    redact: m => maskAllButLast(m[0].replace(/\D/g, ''), 4)
  },
  {
    name: 'aws_access_key',
    regex: /\bAKIA[0-9A-Z]{16}\b/g,
    redact: m => maskAllButFirst(m[0], 4)
  },
  {
    name: 'api_key',
    regex: /\b(?:sk|pk|rk)_(?:live|test)_[A-Za-z0-9]{16,}\b/g,
    redact: m => maskAllButFirst(m[0], 4)
  },
  {
    name: 'github_token',
    regex: /\bgh[pousr]_[A-Za-z0-9]{36,}\b/g,
    redact: m => maskAllButFirst(m[0], 4)
  },
  {
    name: 'password',
    regex: /\b(password|passwd|pwd|passcode)(\s*[:=]\s*)(\S+)/gi,
    redact: m => `${m[1]}${m[2]}${MASK.repeat(8)}`
  },
  {
    name: 'credential',
    regex: /\b((?:api|access|secret)[_-]?key|(?:access|auth|refresh)?[_-]?token|(?:client[_-]?)?secret)(\s*[:=]\s*)(\S+)/gi,
    redact: m => `${m[1]}${m[2]}${MASK.repeat(8)}`
  },
  {
    // Hex keys top out at 4 bits per character, below the entropy floor
    name: 'hex_token',
    regex: /\b[0-9a-f]{32,}\b/gi,
    accept: m => /[a-f]/i.test(m[0]) && /\d/.test(m[0]),
    redact: m => maskAllButFirst(m[0], 4)
  },
  {
    name: 'high_entropy_token',
    regex: /\b[A-Za-z0-9_-]{32,}\b/g,
    accept: m => /[A-Za-z]/.test(m[0]) && /\d/.test(m[0]) && shannonEntropy(m[0]) >= 4,
    redact: m => maskAllButFirst(m[0], 4)
  }
];

/**
 * Flags SSNs, card numbers, credentials and secret-shaped tokens. Evidence is
 * always the redacted span, never the raw value.
 */
export class PiiCheck implements GuardrailCheck {
  readonly kind = 'PII' as const;

  constructor(private readonly patterns: readonly PiiPattern[] = PII_PATTERNS) {}

  inspect(draft: DraftSubmission): GuardrailFlag[] {
    const text = draft.body || '';
    const covered: Array<[number, number]> = [];
    const flags: GuardrailFlag[] = [];

    for (const pattern of this.patterns) {
      const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
      let match: RegExpExecArray | null;
      while ((match = regex.exec(text)) !== null) {
        const start = match.index;
        const end = start + match[0].length;
        if (match[0].length === 0) {
          regex.lastIndex++;
          continue;
        }
        if (covered.some(([s, e]) => start < e && end > s)) continue;
        if (pattern.accept && !pattern.accept(match)) continue;

        covered.push([start, end]);
        flags.push({
          kind: 'PII',
          severity: 'BLOCK',
          evidence: pattern.redact(match),
          matchedPattern: pattern.name
        });
      }
    }

    return flags;
  }
}
