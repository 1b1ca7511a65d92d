import { z } from 'zod';
import catalogJson from '../../data/prospect-catalog.json';
import { ProspectInput } from '../types';

const nonEmptyList = z.array(z.string().min(1)).min(1);

const CatalogSchema = z.object({
  roles: z.record(z.string(), nonEmptyList),
  industries: nonEmptyList,
  geographies: z.record(z.string(), nonEmptyList),
  sellingIntents: nonEmptyList,
  firstNames: nonEmptyList,
  lastNames: nonEmptyList,
  companyPrefixes: nonEmptyList,
  companySuffixes: nonEmptyList,
});

export type ProspectCatalog = z.infer<typeof CatalogSchema>;

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export function loadProspectCatalog(raw: unknown = catalogJson): ProspectCatalog {
  const catalog = CatalogSchema.parse(raw);
  if (Object.keys(catalog.roles).length === 0 || Object.keys(catalog.geographies).length === 0) {
    throw new Error('Prospect catalog needs at least one role family and one geography');
  }
  return catalog;
}

function titleCase(text: string): string {
  return text.replace(/\b([a-z])/g, c => c.toUpperCase());
}

interface ProspectTemplate {
  role: string;
  industry: string;
  geography: string;
  sellingIntent: string;
}

/**
 * Synthetic prospects spread evenly across role families, then shuffled.
 * Company names are unique within one batch.
 */
export class ProspectGenerator {
  private catalog: ProspectCatalog;

  constructor(
    catalog?: ProspectCatalog,
    private random: RandomSource = Math.random
  ) {
    this.catalog = catalog ?? loadProspectCatalog();
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.min(items.length - 1, Math.floor(this.random() * items.length))];
  }

  private shuffle<T>(items: T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.min(i, Math.floor(this.random() * (i + 1)));
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }

  private template(family: string): ProspectTemplate {
    return {
      role: this.pick(this.catalog.roles[family]),
      industry: this.pick(this.catalog.industries),
      geography: this.pick(Object.keys(this.catalog.geographies)),
      sellingIntent: this.pick(this.catalog.sellingIntents),
    };
  }

  private templates(count: number): ProspectTemplate[] {
    const families = Object.keys(this.catalog.roles);
    const perFamily = Math.floor(count / families.length);
    const templates: ProspectTemplate[] = [];

    for (const family of families) {
      for (let i = 0; i < perFamily; i++) templates.push(this.template(family));
    }
    while (templates.length < count) {
      templates.push(this.template(this.pick(families)));
    }
    return this.shuffle(templates);
  }

  generate(count: number): ProspectInput[] {
    const used = new Set<string>();
    const prospects = this.templates(Math.max(0, Math.floor(count))).map(t => {
      const base = `${this.pick(this.catalog.companyPrefixes)} ${titleCase(t.industry)} ${this.pick(this.catalog.companySuffixes)}`;
      let company = base;
      for (let n = 1; used.has(company); n++) company = `${base} ${n}`;
      used.add(company);

      return {
        firstName: this.pick(this.catalog.firstNames),
        lastName: this.pick(this.catalog.lastNames),
        title: t.role,
        company,
        phone: '',
        country: this.pick(this.catalog.geographies[t.geography]),
        linkedinProfile: '',
        sellingIntent: t.sellingIntent,
      };
    });

    console.log(
      `[prospect-generator] Generated ${prospects.length} prospects, ` +
        `${new Set(prospects.map(p => p.sellingIntent)).size} distinct selling intents`
    );
    return prospects;
  }
}
