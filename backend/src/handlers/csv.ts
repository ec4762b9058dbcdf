import AdmZip from "adm-zip";
import { parse } from "csv-parse/sync";
import type { Dirent } from "node:fs";
import { open, readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../config";
import type { AnswerContext } from "../context";
import { answerGeneralQuestion } from "../llm";
import { withCsvExcerpt } from "../prompt";
import { withTempDir } from "../tempfiles";

export const NO_CSV_IN_ZIP = "No CSV files found in the ZIP archive.";
export const NO_ANSWER_COLUMN = "No 'answer' column found in the CSV.";
export const NO_ROWS = "No rows found in the CSV.";
export const UNSUPPORTED_FORMAT = "Unsupported file format.";

const EXCERPT_ROWS = 10;
const ZIP_SIGNATURES = ["504b0304", "504b0506"];

export type CsvTable = {
  header: string[];
  rows: string[][];
};

async function hasZipSignature(filePath: string): Promise<boolean> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(4);
    const { bytesRead } = await handle.read(buffer, 0, 4, 0);
    return bytesRead === 4 && ZIP_SIGNATURES.includes(buffer.toString("hex"));
  } finally {
    await handle.close();
  }
}

export async function isZipFile(filePath: string): Promise<boolean> {
  return filePath.toLowerCase().endsWith(".zip") || hasZipSignature(filePath);
}

function isCsvName(name: string): boolean {
  return name.toLowerCase().endsWith(".csv") && !name.startsWith("._");
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Top-down walk: a directory's own files are checked before its subdirectories. */
export async function findFirstCsv(dir: string): Promise<string | null> {
  const entries = (await readdir(dir, { withFileTypes: true })).sort(byName);

  for (const entry of entries) {
    if (entry.isFile() && isCsvName(entry.name)) {
      return path.join(dir, entry.name);
    }
  }

  for (const entry of entries) {
    // macOS resource forks
    if (entry.isDirectory() && entry.name !== "__MACOSX") {
      const found = await findFirstCsv(path.join(dir, entry.name));
      if (found) return found;
    }
  }

  return null;
}

export function parseCsv(text: string): CsvTable {
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!Array.isArray(records)) {
    throw new Error("CSV parser returned an unexpected result");
  }

  const rows = records.map((record) => (Array.isArray(record) ? record.map((cell) => String(cell)) : []));
  const [header = [], ...body] = rows;
  return { header, rows: body };
}

export function formatTable(table: CsvTable): string {
  const { header } = table;
  const rows = table.rows.map((row) => header.map((_, i) => row[i] ?? ""));

  const widths = header.map((name, i) => Math.max(name.length, ...rows.map((row) => row[i].length)));
  const indexWidth = Math.max(1, String(Math.max(rows.length - 1, 0)).length);

  const headerLine = [" ".repeat(indexWidth), ...header.map((name, i) => name.padStart(widths[i]))].join("  ");
  const bodyLines = rows.map((row, index) =>
    [String(index).padEnd(indexWidth), ...row.map((cell, i) => cell.padStart(widths[i]))].join("  "),
  );

  return [headerLine, ...bodyLines].join("\n");
}

async function answerFromCsv(question: string, csvPath: string, ctx: AnswerContext): Promise<string> {
  const table = parseCsv(await readFile(csvPath, "utf8"));

  if (question.toLowerCase().includes("answer column")) {
    const column = table.header.indexOf("answer");
    if (column === -1) {
      return NO_ANSWER_COLUMN;
    }
    const firstRow = table.rows[0];
    if (!firstRow) {
      return NO_ROWS;
    }
    return firstRow[column] ?? "";
  }

  const excerpt = formatTable({ header: table.header, rows: table.rows.slice(0, EXCERPT_ROWS) });
  return answerGeneralQuestion(withCsvExcerpt(question, excerpt), ctx);
}

/**
 * Answers from a direct CSV upload or from the first CSV inside a ZIP upload.
 * Archives are unpacked into a scratch directory that is gone when this resolves.
 */
export async function answerCsvQuestion(question: string, filePath: string, ctx: AnswerContext): Promise<string> {
  try {
    if (await isZipFile(filePath)) {
      return await withTempDir("csv-zip", async (dir) => {
        new AdmZip(filePath).extractAllTo(dir, true);
        const csvPath = await findFirstCsv(dir);
        if (!csvPath) {
          return NO_CSV_IN_ZIP;
        }
        console.log(`[CSV] Using ${path.relative(dir, csvPath)} from archive`);
        return answerFromCsv(question, csvPath, ctx);
      });
    }

    if (isCsvName(path.basename(filePath))) {
      return await answerFromCsv(question, filePath, ctx);
    }

    return UNSUPPORTED_FORMAT;
  } catch (error) {
    console.error(`[CSV] ${errorMessage(error)}`);
    return `Error processing CSV file: ${errorMessage(error)}`;
  }
}
