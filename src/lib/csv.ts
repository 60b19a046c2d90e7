import fs from "fs";
import path from "path";
import csv from "csv-parser";
import { CsvFileNotFoundError } from "./errors.js";

export type CsvRow = Record<string, string>;

export async function readCsvRows(filePath: string): Promise<CsvRow[]> {
  const resolved = path.resolve(filePath);
  try {
    await fs.promises.access(resolved, fs.constants.R_OK);
  } catch {
    throw new CsvFileNotFoundError(filePath);
  }

  const stream = fs.createReadStream(resolved).pipe(
    csv({
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim(),
    })
  );
  const rows: CsvRow[] = [];
  for await (const row of stream) {
    rows.push(row);
  }
  return rows;
}
