/**
 * Unit tests for ToneCheck class
 */

import { ToneCheck } from '../../../services/guardrails/ToneCheck';
import { makeConfig, makeDraft } from '../../helpers/fixtures';

describe('ToneCheck', () => {
  let check: ToneCheck;

  beforeEach(() => {
    check = new ToneCheck(makeConfig().guardrails.tone);
  });

  it('should warn about aggressive wording', () => {
    expect(check.inspect(makeDraft({ body: 'Frankly this is ridiculous.' }))).toEqual([
      { kind: 'TONE', severity: 'WARN', evidence: '"ridiculous" (aggressive language)', matchedPattern: 'aggressive:ridiculous' }
    ]);
  });

  it('should warn about liability-creating promises', () => {
    const flags = check.inspect(makeDraft({ body: 'We guarantee delivery by Friday.' }));
    expect(flags.map(flag => flag.matchedPattern)).toEqual(['liability:guarantee']);
  });

  it('should block severe terms outright', () => {
    expect(check.inspect(makeDraft({ body: 'Please shut up about it.' }))[0].severity).toBe('BLOCK');
  });

  it('should escalate every flag once enough terms match', () => {
    const flags = check.inspect(makeDraft({ body: 'lol this is stupid, but we promise to fix it' }));

    expect(flags.map(flag => flag.matchedPattern)).toEqual(['aggressive:stupid', 'liability:promise', 'slang:lol']);
    expect(flags.every(flag => flag.severity === 'BLOCK')).toBe(true);
  });

  it('should keep a professional draft clean', () => {
    expect(check.inspect(makeDraft())).toEqual([]);
  });
});
