import type { TemplateCatalog } from '../capabilities/index.js';
import { SelectionError } from '../errors/index.js';
import { TIERS, type Template, type Tier, type TierRatios } from '../types.js';
import { defaultRng, shuffle, type Rng } from './random.js';

// Absorbs float error such as 0.29999999999999999 * 10
const FLOOR_EPSILON = 1e-9;

/**
 * Integer template count per tier: floor(count * ratio) for every tier, with the
 * rounding remainder going to tier1 so the total always equals `count`.
 */
export function tierCounts(count: number, ratios: TierRatios): Record<Tier, number> {
  const counts: Record<Tier, number> = {
    tier1: Math.floor(count * ratios.tier1 + FLOOR_EPSILON),
    tier2: Math.floor(count * ratios.tier2 + FLOOR_EPSILON),
    tier3: Math.floor(count * ratios.tier3 + FLOOR_EPSILON),
  };

  const remainder = count - (counts.tier1 + counts.tier2 + counts.tier3);
  counts.tier1 = Math.max(0, counts.tier1 + remainder);
  return counts;
}

function matchesNiche(template: Template, niche: string): boolean {
  const needle = niche.toLowerCase();
  return (
    template.category.toLowerCase() === needle ||
    template.tags.some((tag) => tag.toLowerCase() === needle)
  );
}

export class TemplateSelector {
  constructor(
    private readonly catalog: TemplateCatalog,
    private readonly rng: Rng = defaultRng
  ) {}

  select(nicheHint: string | undefined, count: number, ratios: TierRatios): Template[] {
    if (count <= 0) return [];

    const templates = this.catalog.list();
    if (templates.length === 0) {
      throw new SelectionError('Template catalog is empty');
    }

    const byTier: Record<Tier, Template[]> = { tier1: [], tier2: [], tier3: [] };
    for (const template of templates) {
      byTier[template.tier].push(template);
    }

    const counts = tierCounts(count, ratios);

    // A tier with no catalog entries hands its share to tier1
    for (const tier of ['tier2', 'tier3'] as const) {
      if (counts[tier] > 0 && byTier[tier].length === 0) {
        counts.tier1 += counts[tier];
        counts[tier] = 0;
      }
    }

    if (counts.tier1 > 0 && byTier.tier1.length === 0) {
      throw new SelectionError(`No tier1 templates available to fill ${counts.tier1} slot(s)`);
    }

    const selected: Template[] = [];
    for (const tier of TIERS) {
      selected.push(...this.sampleTier(byTier[tier], nicheHint, counts[tier]));
    }
    return selected;
  }

  // Niche matches first, then the rest of the tier, both without replacement.
  // Only when the whole tier is used up does the pool get reshuffled and reused.
  private sampleTier(pool: Template[], nicheHint: string | undefined, wanted: number): Template[] {
    if (wanted === 0) return [];

    const niche = nicheHint?.trim();
    const nicheMatches = niche ? pool.filter((t) => matchesNiche(t, niche)) : [];
    const others = niche ? pool.filter((t) => !matchesNiche(t, niche)) : pool;

    let queue = [...shuffle(nicheMatches, this.rng), ...shuffle(others, this.rng)];
    const picks: Template[] = [];

    while (picks.length < wanted) {
      if (queue.length === 0) {
        queue = shuffle(pool, this.rng);
      }
      const next = queue.shift();
      if (next) picks.push(next);
    }

    return picks;
  }
}
