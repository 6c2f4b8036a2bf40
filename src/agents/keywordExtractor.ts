import type { ExtractedRecord } from '../types';
import type { ExtractionInput, ExtractionOutcome, RecordExtractor } from './extractor';

export const KEYWORDS = {
  AgesServed: ['infant', 'toddler', 'preschool', 'pre-k', 'school age'],
  Mandarin: ['mandarin', 'chinese', 'bilingual'],
  MealsProvided: ['meals', 'lunch', 'snack included'],
  Curriculum: ['montessori', 'play-based', 'reggio', 'emergent'],
  CulturalDiversity: ['diverse', 'inclusive', 'multicultural', 'equity'],
  StaffStability: ['same teacher', 'low turnover', 'consistent caregiver', 'long term'],
} satisfies Record<keyof ExtractedRecord, string[]>;

const matches = (text: string, keys: string[]) => keys.filter((k) => text.includes(k));

/**
 * Keyword-bank summary for when no model is available. Every field is
 * derived from plain substring hits on the lower-cased text.
 */
export function extractByKeywords(text: string): ExtractedRecord {
  const lower = text.toLowerCase();
  const hit = (keys: string[]) => matches(lower, keys).length > 0;

  return {
    AgesServed: matches(lower, KEYWORDS.AgesServed).join(', '),
    Mandarin: hit(KEYWORDS.Mandarin) ? 'Yes' : 'No',
    MealsProvided: hit(KEYWORDS.MealsProvided) ? 'Yes' : 'No',
    Curriculum: matches(lower, KEYWORDS.Curriculum).join(', '),
    CulturalDiversity: hit(KEYWORDS.CulturalDiversity) ? 'High' : 'Unknown',
    StaffStability: hit(KEYWORDS.StaffStability) ? 'Yes' : 'No',
  };
}

export const keywordExtractor: RecordExtractor = {
  async extract({ text }: ExtractionInput): Promise<ExtractionOutcome> {
    return { record: extractByKeywords(text), ok: true, attempts: 1 };
  },
};
