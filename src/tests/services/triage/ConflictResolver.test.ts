/**
 * Unit tests for ConflictResolver class
 */

import { ConflictResolver, stripReplyPrefixes } from '../../../services/triage/ConflictResolver';
import { EmailRecord } from '../../../types/models';
import { NOW, hoursBefore, makeConfig, makeRecord } from '../../helpers/fixtures';

const minutesAfter = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * 60 * 1000);

describe('ConflictResolver', () => {
  let resolver: ConflictResolver;

  beforeEach(() => {
    resolver = new ConflictResolver(makeConfig());
  });

  describe('stripReplyPrefixes', () => {
    it('should strip stacked prefixes and count them', () => {
      expect(stripReplyPrefixes('RE: Fwd:  Budget Review ')).toEqual({ subject: 'budget review', depth: 2 });
      expect(stripReplyPrefixes('AW: hallo')).toEqual({ subject: 'hallo', depth: 1 });
      expect(stripReplyPrefixes('Regarding the plan')).toEqual({ subject: 'regarding the plan', depth: 0 });
    });
  });

  describe('thread resolution', () => {
    const earlier = makeRecord({ messageId: 'msg-a', threadId: 'thread-1', receivedAt: hoursBefore(NOW, 2) });
    const later = makeRecord({ messageId: 'msg-b', threadId: 'thread-1', receivedAt: NOW, subject: 'Re: Offsite notes' });

    it('should keep only the latest record of a thread', () => {
      const result = resolver.resolve([earlier, later]);

      expect(result.resolved).toHaveLength(1);
      expect(result.resolved[0].record.messageId).toBe('msg-b');
      expect(result.resolved[0].threadDepth).toBe(2);
      expect(result.resolved[0].supersededIds).toEqual(['msg-a']);
      expect(result.superseded).toEqual([{ messageId: 'msg-a', supersededBy: 'msg-b', reason: 'thread' }]);
    });

    it('should not depend on input order', () => {
      expect(resolver.resolve([later, earlier])).toEqual(resolver.resolve([earlier, later]));
    });

    it('should break timestamp ties by message id', () => {
      const first = makeRecord({ messageId: 'msg-x', threadId: 'thread-2' });
      const second = makeRecord({ messageId: 'msg-y', threadId: 'thread-2' });

      expect(resolver.resolve([second, first]).resolved[0].record.messageId).toBe('msg-y');
    });

    it('should derive depth from reply prefixes of a lone message', () => {
      const reply = makeRecord({ messageId: 'msg-r', threadId: 'thread-3', subject: 'Re: Re: Fwd: plan' });
      expect(resolver.resolve([reply]).resolved[0].threadDepth).toBe(4);
    });

    it('should treat records without a thread id as separate threads', () => {
      const result = resolver.resolve([
        makeRecord({ messageId: 'msg-1', sender: 'a@company.com' }),
        makeRecord({ messageId: 'msg-2', sender: 'b@company.com' })
      ]);

      expect(result.resolved.map(item => item.record.messageId)).toEqual(['msg-1', 'msg-2']);
      expect(result.superseded).toEqual([]);
    });

    it('should return resolved messages oldest first', () => {
      const result = resolver.resolve([
        makeRecord({ messageId: 'msg-new', sender: 'a@company.com', receivedAt: NOW }),
        makeRecord({ messageId: 'msg-old', sender: 'b@company.com', receivedAt: hoursBefore(NOW, 5) })
      ]);

      expect(result.resolved.map(item => item.record.messageId)).toEqual(['msg-old', 'msg-new']);
    });
  });

  describe('burst consolidation', () => {
    const start = hoursBefore(NOW, 3);
    const burst: EmailRecord[] = [
      makeRecord({ messageId: 'burst-1', sender: 'ops@company.com', subject: 'Server down', receivedAt: start }),
      makeRecord({ messageId: 'burst-2', sender: 'ops@company.com', subject: 'Re: Server down', receivedAt: minutesAfter(start, 10) }),
      makeRecord({ messageId: 'burst-3', sender: 'OPS@company.com', subject: 'server down', receivedAt: minutesAfter(start, 20) }),
      makeRecord({ messageId: 'burst-4', sender: 'ops@company.com', subject: 'Server down', receivedAt: minutesAfter(start, 120) })
    ];

    it('should fold messages inside the window into the latest one', () => {
      const result = resolver.resolve(burst);

      expect(result.resolved.map(item => item.record.messageId)).toEqual(['burst-3', 'burst-4']);
      expect(result.resolved[0].consolidatedCount).toBe(3);
      expect(result.resolved[0].supersededIds).toEqual(['burst-1', 'burst-2']);
      expect(result.resolved[0].threadDepth).toBe(2);
      expect(result.resolved[1].consolidatedCount).toBe(1);
      expect(result.superseded).toEqual([
        { messageId: 'burst-1', supersededBy: 'burst-3', reason: 'burst' },
        { messageId: 'burst-2', supersededBy: 'burst-3', reason: 'burst' }
      ]);
    });

    it('should leave bursts alone when consolidation is off', () => {
      const plain = new ConflictResolver(makeConfig(draft => {
        draft.conflicts.consolidateBursts = false;
      }));

      expect(plain.resolve(burst).resolved).toHaveLength(4);
    });

    it('should never merge records without a sender', () => {
      const result = resolver.resolve([
        makeRecord({ messageId: 'anon-1', sender: '', subject: 'Hello' }),
        makeRecord({ messageId: 'anon-2', sender: '', subject: 'Hello' })
      ]);

      expect(result.resolved).toHaveLength(2);
    });
  });
});
