import { describe, it, expect } from 'vitest';
import {
  findStaleSpfRecords,
  fixedChainNames,
  isSpfRecord,
  planSpfChain,
  spfTargetsWithin,
} from '../../../src/services/SpfChainPlanner.js';
import { ValidationError } from '../../../src/core/errors.js';
import { RecordValidator } from '../../../src/services/RecordValidator.js';
import type { DnsRecord } from '../../../src/types/index.js';
import { sequenceRandom } from '../../helpers/random.js';

const FINAL = 'v=spf1 include:_spf.mail.example.net ~all';
const LABEL_1 = 'abcdefghijklmnopqrstuvwxyz012345';
const LABEL_2 = '6789abcdefghijklmnopqrstuvwxyz01';

function txt(id: string, name: string, content: string): DnsRecord {
  return { id, domain: 'example.com', name, type: 'TXT', content, ttl: 600 };
}

const apexSpf = txt('1', '', 'v=spf1 include:oldlink.example.com ~all');
const oldLink = txt('2', 'oldlink', 'v=spf1 include:legacy.example.com ~all');
const legacy = txt('3', 'legacy', 'ip4:192.0.2.0/24');
const verification = txt('4', '', 'site-verification=placeholder');
const notes = txt('5', 'notes', 'hello');
const web: DnsRecord = { id: '6', domain: 'example.com', name: 'www', type: 'A', content: '192.0.2.10', ttl: 600 };
const mailSpf = txt('7', 'mail', '"v=spf1 include:_spf.mail.example.net ~all"');

const existing = [apexSpf, oldLink, legacy, verification, notes, web, mailSpf];

describe('SpfChainPlanner', () => {
  it('should recognise quoted and unquoted SPF records', () => {
    expect(isSpfRecord(apexSpf)).toBe(true);
    expect(isSpfRecord(mailSpf)).toBe(true);
    expect(isSpfRecord(notes)).toBe(false);
    expect(isSpfRecord({ ...web, content: 'v=spf1' })).toBe(false);
  });

  it('should find include and redirect targets inside the domain', () => {
    expect(
      spfTargetsWithin('v=spf1 include:a.example.com redirect=B.Example.com include:_spf.mail.example.net ~all', 'example.com')
    ).toEqual(['a', 'b']);
  });

  it('should list the names every chain writes', () => {
    expect([...fixedChainNames({ domain: 'example.com', chainLength: 3, finalDirective: FINAL })]).toEqual(['']);
    expect([
      ...fixedChainNames({ domain: 'example.com', chainLength: 1, finalDirective: FINAL, wildcardRedirect: true }),
    ]).toEqual(['', '*', '_spf']);
  });

  describe('findStaleSpfRecords', () => {
    it('should follow include targets and clear TXT records at chain names', () => {
      const stale = findStaleSpfRecords('example.com', existing, new Set(['']));

      expect(stale.map((r) => r.id)).toEqual(['1', '2', '3', '4', '7']);
    });

    it('should leave unrelated records alone', () => {
      const stale = findStaleSpfRecords('example.com', [notes, web], new Set(['']));

      expect(stale).toEqual([]);
    });
  });

  describe('planSpfChain', () => {
    it('should delete the old chain and create the new one with links before the apex', () => {
      const { plan, chain } = planSpfChain(
        { domain: 'example.com', chainLength: 2, finalDirective: FINAL, ttl: 600 },
        existing,
        { random: sequenceRandom() }
      );

      expect(plan.toDelete.map((r) => r.id)).toEqual(['1', '2', '3', '4', '7']);
      expect(plan.toCreate).toEqual([
        { name: LABEL_1, type: 'TXT', content: `v=spf1 include:${LABEL_2}.example.com ~all`, ttl: 600 },
        { name: LABEL_2, type: 'TXT', content: FINAL, ttl: 600 },
        { name: '', type: 'TXT', content: `v=spf1 include:${LABEL_1}.example.com ~all`, ttl: 600 },
      ]);
      expect(chain.map((c) => c.role)).toEqual(['link', 'link', 'apex']);
    });

    it('should let the new chain reuse names that are being deleted', () => {
      const previousLink = txt('8', LABEL_1, FINAL);

      const { plan } = planSpfChain(
        { domain: 'example.com', chainLength: 2, finalDirective: FINAL },
        [previousLink, web],
        { random: sequenceRandom() }
      );

      expect(plan.toDelete).toEqual([previousLink]);
      expect(plan.toCreate[0]?.name).toBe(LABEL_1);
      expect(plan.toCreate[0]).not.toHaveProperty('ttl');
    });

    it('should avoid names of records that stay', () => {
      const keeper: DnsRecord = { ...web, name: LABEL_1 };

      const { plan } = planSpfChain(
        { domain: 'example.com', chainLength: 2, finalDirective: FINAL },
        [keeper],
        { random: sequenceRandom() }
      );

      expect(plan.toCreate.map((r) => r.name)).toEqual([LABEL_2, '23456789abcdefghijklmnopqrstuvwx', '']);
    });

    it('should clear a non-SPF TXT record at _spf for a single link chain', () => {
      const placeholder = txt('9', '_spf', 'reserved');

      const { plan } = planSpfChain({ domain: 'example.com', chainLength: 1, finalDirective: FINAL }, [placeholder]);

      expect(plan.toDelete).toEqual([placeholder]);
      expect(plan.toCreate.map((r) => r.name)).toEqual(['_spf', '']);
    });

    it('should mark the wildcard and apex records as depending on the links', () => {
      const plain = planSpfChain({ domain: 'example.com', chainLength: 2, finalDirective: FINAL }, existing, {
        random: sequenceRandom(),
      });
      const withWildcard = planSpfChain(
        { domain: 'example.com', chainLength: 2, finalDirective: FINAL, wildcardRedirect: true },
        existing,
        { random: sequenceRandom() }
      );

      expect(plain.plan.dependentCreates).toBe(1);
      expect(withWildcard.plan.dependentCreates).toBe(2);
      expect(withWildcard.plan.toCreate.slice(-2).map((r) => r.name)).toEqual(['*', '']);
    });

    it('should reject a chain record the validator refuses', () => {
      const longFinal = `v=spf1 ${'a'.repeat(120)} ~all`;

      expect(() =>
        planSpfChain({ domain: 'example.com', chainLength: 2, finalDirective: longFinal }, existing, {
          random: sequenceRandom(),
          validator: new RecordValidator({ txtMaxLength: 100 }),
        })
      ).toThrow(`Invalid SPF chain: toCreate.1.content: ${LABEL_2}: TXT content exceeds 100 characters`);
    });

    it('should reject an invalid spec before planning', () => {
      expect(() => planSpfChain({ domain: 'example.com', chainLength: 11, finalDirective: FINAL }, existing)).toThrow(
        ValidationError
      );
    });
  });
});
