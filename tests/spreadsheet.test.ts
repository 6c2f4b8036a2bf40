import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import ExcelJS from "exceljs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_WEIGHTS } from "../src/scoring";
import {
  cellText,
  readProviderRows,
  readResults,
  RESULTS_SHEET,
  WEIGHTS_SHEET,
  writeResults,
} from "../src/spreadsheet";
import type { ScoredProvider } from "../src/types";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "sheets-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const ROWS: ScoredProvider[] = [
  {
    Rank: 1,
    Name: "Maple Grove Montessori",
    Address: "3 Pine St",
    Phone: "555-0103",
    Rating: 4.8,
    Website: "https://maple.example",
    Distance: 2.5,
    Type: "Center",
    MSFTDiscount: "Yes",
    AgesServed: "toddler, preschool",
    Mandarin: "Yes",
    MealsProvided: "Yes",
    Curriculum: "Montessori",
    CulturalDiversity: "High",
    StaffStability: "Yes",
    Score: 10,
    Status: "ok",
  },
  {
    Rank: 2,
    Name: "Quiet Corner",
    Address: "1 Elm St",
    Phone: "555-0101",
    Rating: null,
    Website: "",
    Distance: null,
    Type: "Unknown",
    MSFTDiscount: "No",
    AgesServed: "",
    Mandarin: "No",
    MealsProvided: "No",
    Curriculum: "",
    CulturalDiversity: "Unknown",
    StaffStability: "No",
    Score: 0,
    Status: "No website",
  },
];

describe("cellText", () => {
  it("flattens rich text, hyperlinks and formula results", () => {
    expect(cellText({ richText: [{ text: "Sunny " }, { text: "Days" }] })).toBe("Sunny Days");
    expect(cellText({ text: "kids.example", hyperlink: "https://kids.example" })).toBe("kids.example");
    expect(cellText({ formula: "A1*2", result: 8, date1904: false })).toBe("8");
    expect(cellText(null)).toBe("");
  });
});

describe("writeResults / readResults", () => {
  it("round-trips scored providers", async () => {
    const file = path.join(dir, "out", "results.xlsx");

    await writeResults(file, ROWS, DEFAULT_WEIGHTS);
    const back = await readResults(file);

    expect(back.map((r) => [r.Rank, r.Name, r.Score])).toEqual([
      [1, "Maple Grove Montessori", 10],
      [2, "Quiet Corner", 0],
    ]);
    expect(back).toEqual(ROWS);
  });

  it("writes the weight sheet with priority labels", async () => {
    const file = path.join(dir, "results.xlsx");
    await writeResults(file, ROWS, { ...DEFAULT_WEIGHTS, Mandarin: 5 });

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(file);
    const sheet = workbook.getWorksheet(WEIGHTS_SHEET);
    const rows = [2, 3, 7].map((n) => {
      const row = sheet?.getRow(n);
      return [1, 2, 3].map((col) => row?.getCell(col).value);
    });

    expect(rows).toEqual([
      ["Mandarin", 5, "High"],
      ["Meals", 1, "Low"],
      ["MSFT Discount", 3, "Medium"],
    ]);
    expect(workbook.getWorksheet(RESULTS_SHEET)?.getRow(1).getCell(7).value).toBe("Distance (mi)");
  });
});

describe("readProviderRows", () => {
  const writeInput = async (file: string) => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Providers");
    sheet.addRow(["Name", "Address", "Phone", "Rating", "Website", "Website_2", "Website 3", "Status"]);
    sheet.addRow([
      "Sunrise Learning",
      "1 Elm St",
      "555-0101",
      4.5,
      "sunrise.example",
      "https://sunrise.example/",
      null,
      "keep",
    ]);
    sheet.addRow(["Little Explorers", "2 Oak St", null, null, null, null, null, "drop"]);
    sheet.addRow([null, "9 Nowhere Rd"]);
    sheet.addRow([
      "Harbor Childcare",
      "4 Bay St",
      "555-0104",
      null,
      { text: "harbor.example", hyperlink: "https://harbor.example" },
      "https://harbor.example/menu",
      null,
      "Keep",
    ]);
    await workbook.xlsx.writeFile(file);
  };

  it("reads named rows and merges the website columns", async () => {
    const file = path.join(dir, "providers.xlsx");
    await writeInput(file);

    expect(await readProviderRows(file)).toEqual([
      {
        name: "Sunrise Learning",
        address: "1 Elm St",
        phone: "555-0101",
        rating: 4.5,
        distance: null,
        websites: ["https://sunrise.example/"],
        status: "keep",
      },
      {
        name: "Little Explorers",
        address: "2 Oak St",
        phone: "",
        rating: null,
        distance: null,
        websites: [],
        status: "drop",
      },
      {
        name: "Harbor Childcare",
        address: "4 Bay St",
        phone: "555-0104",
        rating: null,
        distance: null,
        websites: ["https://harbor.example/", "https://harbor.example/menu"],
        status: "Keep",
      },
    ]);
  });

  it("keeps only rows marked keep when asked", async () => {
    const file = path.join(dir, "providers.xlsx");
    await writeInput(file);

    const rows = await readProviderRows(file, { onlyKeep: true });
    expect(rows.map((r) => r.name)).toEqual(["Sunrise Learning", "Harbor Childcare"]);
  });

  it("fails when the sheet does not exist", async () => {
    const file = path.join(dir, "providers.xlsx");
    await writeInput(file);

    await expect(readProviderRows(file, { sheet: "Missing" })).rejects.toThrow(
      `Worksheet "Missing" not found in ${file}`
    );
  });
});
