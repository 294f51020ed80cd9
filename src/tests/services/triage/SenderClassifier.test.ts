/**
 * Unit tests for SenderClassifier class
 */

import { SenderClassifier } from '../../../services/triage/SenderClassifier';
import { withVipAddress } from '../../../config/triage';
import { makeConfig } from '../../helpers/fixtures';

describe('SenderClassifier', () => {
  const config = makeConfig(draft => {
    draft.domains.vipAddresses = ['ceo@company.com'];
    draft.domains.vipDomains = ['board.org'];
    draft.domains.blockedDomains = ['spam.biz'];
    draft.domains.vendorDomains = ['supplier.net'];
    draft.domains.customerDomains = ['client.co'];
  });
  let classifier: SenderClassifier;

  beforeEach(() => {
    classifier = new SenderClassifier(config);
  });

  describe('classifyWithRule', () => {
    it.each([
      ['ceo@company.com', 'VIP', 'vip_address'],
      ['Chair <chair@board.org>', 'VIP', 'vip_domain'],
      ['noreply@company.com', 'NO_REPLY', 'no_reply_local_part'],
      ['alice@company.com', 'TEAM', 'internal_domain'],
      ['alice@eng.company.com', 'TEAM', 'internal_domain'],
      ['sales@spam.biz', 'SPAM_SUSPECT', 'blocked_domain'],
      ['orders@supplier.net', 'VENDOR', 'vendor_domain'],
      ['buyer@client.co', 'CUSTOMER', 'customer_domain'],
      ['someone@gmail.com', 'CUSTOMER', 'external_default']
    ])('should classify %s as %s', (sender, expectedClass, expectedRule) => {
      const { profile, ruleId } = classifier.classifyWithRule(sender);
      expect(profile.senderClass).toBe(expectedClass);
      expect(ruleId).toBe(expectedRule);
      expect(profile.malformed).toBe(false);
    });

    it('should let a VIP domain outrank a no-reply local part', () => {
      expect(classifier.classify('noreply@board.org').senderClass).toBe('VIP');
    });
  });

  describe('malformed senders', () => {
    it('should mark a missing sender as SPAM_SUSPECT', () => {
      expect(classifier.classifyWithRule('')).toEqual({
        profile: { address: '', domain: '', senderClass: 'SPAM_SUSPECT', malformed: true },
        ruleId: 'malformed_address'
      });
    });

    it('should keep the raw text of an unparseable sender', () => {
      const profile = classifier.classify('Not-An-Address');
      expect(profile.address).toBe('not-an-address');
      expect(profile.senderClass).toBe('SPAM_SUSPECT');
    });
  });

  describe('configuration changes', () => {
    it('should pick up a VIP added to a new configuration without touching the old one', () => {
      const updated = withVipAddress(config, 'boss@company.com');

      expect(new SenderClassifier(updated).classify('boss@company.com').senderClass).toBe('VIP');
      expect(classifier.classify('boss@company.com').senderClass).toBe('TEAM');
      expect(config.domains.vipAddresses).toEqual(['ceo@company.com']);
    });
  });
});
