import type { ExtractionMode } from './types';

export const EXTRACTION_SYSTEM_PROMPT = `
You are a helpful assistant extracting childcare program information from websites.
Read the provided content and summarize it as a single JSON object with exactly these fields:

- "AgesServed": string, the age groups served (e.g. "infant, toddler, preschool"); "" if not stated
- "Mandarin": "Yes" or "No", whether Mandarin or Chinese language exposure is offered
- "MealsProvided": "Yes" or "No", whether meals or snacks are provided by the program
- "Curriculum": string, the curriculum or philosophy (e.g. "Montessori", "play-based", "Reggio Emilia"); "" if not stated
- "CulturalDiversity": "High", "Medium", "Low" or "Unknown"
- "StaffStability": "Yes" or "No", whether there is evidence of low turnover or long-tenured staff

## Rules
- Return only raw JSON, no markdown fences and no commentary.
- Use "No", "Unknown" or "" when the content does not say.
- Do not invent details that are not supported by the content.
`.trim();

const MODE_GUIDANCE: Record<ExtractionMode, string> = {
  'single-page': 'The content comes from a single web page.',
  'multi-page': [
    'The content comes from several pages of the same website; each page starts with a "=== SOURCE: <url> ===" line.',
    'Synthesize across all pages: a detail stated on any page counts for the whole program.',
  ].join('\n'),
  'multi-source': [
    'The content comes from several independent sources (websites, listings, social pages); each starts with a "=== SOURCE: <url> ===" line.',
    'Sources may disagree. When they conflict, prefer the most complete and most recent-sounding detail.',
  ].join('\n'),
};

export function buildSystemPrompt(mode: ExtractionMode): string {
  return `${EXTRACTION_SYSTEM_PROMPT}\n\n## Source\n${MODE_GUIDANCE[mode]}`;
}

export function buildUserPrompt(text: string, sourceUrls: string[]): string {
  const sources = sourceUrls.length ? `Sources:\n${sourceUrls.map((u) => `- ${u}`).join('\n')}\n\n` : '';
  return `${sources}Website content:\n\n${text}\n\nPlease extract and return a JSON object.`;
}
