import { describe, it, expect } from 'vitest';
import { ProspectGenerator, loadProspectCatalog } from '../../src/services/prospect-generator';

describe('ProspectGenerator', () => {
  it('builds prospects from the catalog with a fixed random source', () => {
    const prospects = new ProspectGenerator(undefined, () => 0).generate(4);

    expect(prospects.map(p => p.title)).toEqual(['CEO', 'President', 'CTO', 'CTO']);
    expect(prospects.map(p => p.company)).toEqual([
      'Global Technology Group',
      'Global Technology Group 1',
      'Global Technology Group 2',
      'Global Technology Group 3',
    ]);
    expect(prospects[0]).toEqual({
      firstName: 'Sarah',
      lastName: 'Johnson',
      title: 'CEO',
      company: 'Global Technology Group',
      phone: '',
      country: 'United States',
      linkedinProfile: '',
      sellingIntent: 'CRM data analytics and customer segmentation',
    });
  });

  it('spreads prospects evenly across role families', () => {
    const catalog = loadProspectCatalog();
    const prospects = new ProspectGenerator(catalog).generate(9);
    const familyOf = (title: string | undefined) =>
      Object.entries(catalog.roles).find(([, titles]) => title !== undefined && titles.includes(title))?.[0];

    const counts: Record<string, number> = {};
    for (const p of prospects) {
      const family = familyOf(p.title) ?? 'unknown';
      counts[family] = (counts[family] ?? 0) + 1;
    }
    expect(counts).toEqual({ technical: 3, business: 3, executive: 3 });
  });

  it('keeps company names unique', () => {
    const prospects = new ProspectGenerator().generate(50);
    expect(new Set(prospects.map(p => p.company)).size).toBe(50);
  });

  it('returns nothing for a zero count', () => {
    expect(new ProspectGenerator().generate(0)).toEqual([]);
  });

  it('rejects a catalog without role families', () => {
    const raw = { ...loadProspectCatalog(), roles: {} };
    expect(() => loadProspectCatalog(raw)).toThrow('Prospect catalog needs at least one role family and one geography');
  });
});
