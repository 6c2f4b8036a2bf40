import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';

import { providerWebsites } from './pipeline';
import { ExtractedRecordSchema } from './record';
import { weightLabel } from './scoring';
import {
  CRITERIA,
  type ProviderCandidate,
  type ProviderType,
  type ScoredProvider,
  type WeightConfig,
} from './types';

export const RESULTS_SHEET = 'Results';
export const WEIGHTS_SHEET = 'Weights';

const RESULT_COLUMNS: Array<{ header: string; key: keyof ScoredProvider; width: number }> = [
  { header: 'Rank', key: 'Rank', width: 6 },
  { header: 'Name', key: 'Name', width: 36 },
  { header: 'Address', key: 'Address', width: 40 },
  { header: 'Phone', key: 'Phone', width: 16 },
  { header: 'Rating', key: 'Rating', width: 8 },
  { header: 'Website', key: 'Website', width: 36 },
  { header: 'Distance (mi)', key: 'Distance', width: 12 },
  { header: 'Type', key: 'Type', width: 10 },
  { header: 'MSFT Discount', key: 'MSFTDiscount', width: 14 },
  { header: 'Ages Served', key: 'AgesServed', width: 28 },
  { header: 'Mandarin', key: 'Mandarin', width: 10 },
  { header: 'Meals Provided', key: 'MealsProvided', width: 14 },
  { header: 'Curriculum', key: 'Curriculum', width: 24 },
  { header: 'Cultural Diversity', key: 'CulturalDiversity', width: 16 },
  { header: 'Staff Stability', key: 'StaffStability', width: 14 },
  { header: 'Score', key: 'Score', width: 8 },
  { header: 'Status', key: 'Status', width: 30 },
];

export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object') return String(value);
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) {
    const { result } = value;
    if (result === undefined) return '';
    if (result instanceof Date) return result.toISOString();
    return typeof result === 'object' ? '' : String(result);
  }
  return '';
}

export function cellNumber(value: CellValue): number | null {
  if (typeof value === 'number') return value;
  const text = cellText(value).trim();
  if (!text) return null;
  const parsed = Number.parseFloat(text);
  return Number.isFinite(parsed) ? parsed : null;
}

const headerKey = (header: string) =>
  header
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');

type SheetRecord = Record<string, CellValue>;

/** Data rows of a sheet keyed by normalized header (`Website 2` → `website_2`). */
function sheetRecords(sheet: Worksheet): SheetRecord[] {
  const headers: string[] = [];
  sheet.getRow(1).eachCell((cell, col) => {
    headers[col] = headerKey(cellText(cell.value));
  });

  const records: SheetRecord[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: SheetRecord = {};
    headers.forEach((key, col) => {
      if (key) record[key] = row.getCell(col).value;
    });
    records.push(record);
  });
  return records;
}

async function openSheet(file: string, name?: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  const sheet = name ? workbook.getWorksheet(name) : workbook.worksheets[0];
  if (!sheet) {
    throw new Error(`Worksheet ${name ? `"${name}" ` : ''}not found in ${file}`);
  }
  return sheet;
}

export type ProviderRow = ProviderCandidate & { status: string };

/**
 * Provider rows from an input workbook. Website, Website_2 and Website_3 are
 * merged into one URL list; with `onlyKeep`, only rows whose Status is
 * "keep" are returned.
 */
export async function readProviderRows(
  file: string,
  { sheet, onlyKeep = false }: { sheet?: string; onlyKeep?: boolean } = {}
): Promise<ProviderRow[]> {
  const records = sheetRecords(await openSheet(file, sheet));

  return records
    .map(
      (rec): ProviderRow => ({
        name: cellText(rec.name).trim(),
        address: cellText(rec.address).trim(),
        phone: cellText(rec.phone).trim(),
        rating: cellNumber(rec.rating),
        distance: cellNumber(rec.distance ?? rec.distance_mi),
        websites: providerWebsites(
          cellText(rec.website),
          cellText(rec.website_2),
          cellText(rec.website_3)
        ),
        status: cellText(rec.status).trim(),
      })
    )
    .filter((row) => row.name)
    .filter((row) => !onlyKeep || row.status.toLowerCase() === 'keep');
}

export async function writeResults(
  file: string,
  rows: ScoredProvider[],
  weights: WeightConfig
): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  const results = workbook.addWorksheet(RESULTS_SHEET);
  results.columns = RESULT_COLUMNS;
  for (const row of rows) results.addRow(row);
  results.getRow(1).font = { bold: true };

  const weightSheet = workbook.addWorksheet(WEIGHTS_SHEET);
  weightSheet.columns = [
    { header: 'Criterion', key: 'criterion', width: 20 },
    { header: 'Weight', key: 'weight', width: 8 },
    { header: 'Priority', key: 'priority', width: 10 },
  ];
  for (const criterion of CRITERIA) {
    const weight = weights[criterion];
    weightSheet.addRow({ criterion, weight, priority: weightLabel(weight) });
  }
  weightSheet.getRow(1).font = { bold: true };

  await mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await workbook.xlsx.writeFile(file);
}

const toProviderType = (value: string): ProviderType =>
  value === 'Center' || value === 'Family' ? value : 'Unknown';

/** Read a workbook written by `writeResults` back into scored rows. */
export async function readResults(file: string): Promise<ScoredProvider[]> {
  const records = sheetRecords(await openSheet(file, RESULTS_SHEET));
  const column = (key: keyof ScoredProvider) => {
    const col = RESULT_COLUMNS.find((c) => c.key === key);
    return col ? headerKey(col.header) : key.toLowerCase();
  };

  return records.map((rec): ScoredProvider => {
    const text = (key: keyof ScoredProvider) => cellText(rec[column(key)]);
    const record = ExtractedRecordSchema.parse({
      AgesServed: text('AgesServed'),
      Mandarin: text('Mandarin'),
      MealsProvided: text('MealsProvided'),
      Curriculum: text('Curriculum'),
      CulturalDiversity: text('CulturalDiversity'),
      StaffStability: text('StaffStability'),
    });

    return {
      Rank: cellNumber(rec[column('Rank')]) ?? 0,
      Name: text('Name'),
      Address: text('Address'),
      Phone: text('Phone'),
      Rating: cellNumber(rec[column('Rating')]),
      Website: text('Website'),
      Distance: cellNumber(rec[column('Distance')]),
      Type: toProviderType(text('Type')),
      MSFTDiscount: text('MSFTDiscount') === 'Yes' ? 'Yes' : 'No',
      ...record,
      Score: cellNumber(rec[column('Score')]) ?? 0,
      Status: text('Status'),
    };
  });
}
