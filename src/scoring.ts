import {
  CRITERIA,
  type ExtractedRecord,
  type ProviderType,
  type ScoredProvider,
  type WeightConfig,
  type YesNo,
} from './types';

export const DEFAULT_WEIGHTS: WeightConfig = {
  Mandarin: 2,
  Meals: 1,
  Curriculum: 1,
  'Staff Stability': 2,
  'Cultural Diversity': 1,
  'MSFT Discount': 3,
};

export type ScoringInput = Partial<ExtractedRecord> & { MSFTDiscount?: YesNo };

/**
 * Sum of the weights whose criterion the record satisfies. Missing fields
 * earn nothing.
 */
export function computeScore(record: ScoringInput, weights: WeightConfig): number {
  let score = 0;
  if (record.Mandarin === 'Yes') score += weights.Mandarin;
  if (record.MealsProvided === 'Yes') score += weights.Meals;
  if (record.Curriculum) score += weights.Curriculum;
  if (record.StaffStability === 'Yes') score += weights['Staff Stability'];
  if (record.CulturalDiversity === 'High') score += weights['Cultural Diversity'];
  if (record.MSFTDiscount === 'Yes') score += weights['MSFT Discount'];
  return score;
}

const TYPE_RULES: Array<{ type: ProviderType; keywords: string[] }> = [
  { type: 'Center', keywords: ['academy', 'montessori', 'center'] },
  { type: 'Family', keywords: ['family', 'home'] },
];

export function classifyType(name: string): ProviderType {
  const lower = name.toLowerCase();
  const rule = TYPE_RULES.find((r) => r.keywords.some((k) => lower.includes(k)));
  return rule ? rule.type : 'Unknown';
}

export function checkDiscountEligible(name: string, allowList: string[]): YesNo {
  const lower = name.toLowerCase();
  for (const provider of allowList) {
    const entry = provider.trim().toLowerCase();
    if (entry && lower.includes(entry)) return 'Yes';
  }
  return 'No';
}

export type WeightPriority = 'High' | 'Medium' | 'Low';

export function weightLabel(weight: number): WeightPriority {
  if (weight >= 4) return 'High';
  if (weight >= 2) return 'Medium';
  return 'Low';
}

/** Descending by score; equal scores keep their input order. */
export function rankProviders<T extends { Score: number }>(rows: T[]): Array<T & { Rank: number }> {
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row.Score - a.row.Score || a.index - b.index)
    .map(({ row }, i) => ({ ...row, Rank: i + 1 }));
}

export function rescoreProviders(rows: ScoredProvider[], weights: WeightConfig): ScoredProvider[] {
  return rankProviders(rows.map((row) => ({ ...row, Score: computeScore(row, weights) })));
}

/**
 * Parse `Mandarin=3,Staff Stability=1` into a full weight config, starting
 * from `base`. Criterion names are matched case-insensitively.
 */
export function parseWeights(text: string, base: WeightConfig = DEFAULT_WEIGHTS): WeightConfig {
  const weights: WeightConfig = { ...base };
  for (const part of text.split(',')) {
    if (!part.trim()) continue;
    const [rawName, rawValue] = part.split('=');
    const name = CRITERIA.find((c) => c.toLowerCase() === (rawName ?? '').trim().toLowerCase());
    const value = Number.parseFloat((rawValue ?? '').trim());
    if (!name) {
      throw new Error(`Unknown criterion "${rawName?.trim()}". Expected one of: ${CRITERIA.join(', ')}`);
    }
    if (!Number.isFinite(value)) {
      throw new Error(`Weight for ${name} is not a number: "${rawValue ?? ''}"`);
    }
    weights[name] = value;
  }
  return weights;
}
