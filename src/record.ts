import { z } from 'zod';

import type { ExtractedRecord } from './types';

export const defaultRecord = (): ExtractedRecord => ({
  AgesServed: '',
  Mandarin: 'No',
  MealsProvided: 'No',
  Curriculum: '',
  CulturalDiversity: 'Unknown',
  StaffStability: 'No',
});

const lowered = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const yesNo = z
  .preprocess((value) => {
    if (typeof value === 'boolean') return value ? 'Yes' : 'No';
    const v = lowered(value);
    if (v === 'yes' || v === 'true') return 'Yes';
    if (v === 'no' || v === 'false') return 'No';
    return value;
  }, z.enum(['Yes', 'No']))
  .catch('No');

const diversity = z
  .preprocess((value) => {
    const v = lowered(value);
    if (typeof v !== 'string' || !v) return value;
    return v.charAt(0).toUpperCase() + v.slice(1);
  }, z.enum(['High', 'Medium', 'Low', 'Unknown']))
  .catch('Unknown');

const freeText = z
  .preprocess((value) => {
    if (Array.isArray(value)) return value.filter((v) => typeof v === 'string').join(', ');
    if (typeof value === 'number') return String(value);
    if (value === null || value === undefined) return '';
    return value;
  }, z.string().transform((s) => s.trim()))
  .catch('');

/**
 * Lenient shape for decoded model output: the six fields are coerced to their
 * domains, anything missing or unusable falls back to the default value and
 * extra keys are dropped. Only a non-object fails.
 */
export const ExtractedRecordSchema = z.object({
  AgesServed: freeText,
  Mandarin: yesNo,
  MealsProvided: yesNo,
  Curriculum: freeText,
  CulturalDiversity: diversity,
  StaffStability: yesNo,
});

export function toRecord(entry: ExtractedRecord): ExtractedRecord {
  return {
    AgesServed: entry.AgesServed,
    Mandarin: entry.Mandarin,
    MealsProvided: entry.MealsProvided,
    Curriculum: entry.Curriculum,
    CulturalDiversity: entry.CulturalDiversity,
    StaffStability: entry.StaffStability,
  };
}
