import { google, type sheets_v4 } from "googleapis";
import type { DirectoryRow, SheetSource } from "./types.js";

const READONLY_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

/**
 * Turn a values grid into records keyed by the header row. Header cells are
 * trimmed; rows with no content are skipped; missing trailing cells read as "".
 */
export function recordsFromValues(values: readonly (readonly unknown[])[]): DirectoryRow[] {
  const [header, ...body] = values;
  if (!header) return [];
  const columns = header.map((h) => String(h ?? "").trim());

  const records: DirectoryRow[] = [];
  for (const row of body) {
    const cells = columns.map((_, i) => String(row[i] ?? ""));
    if (cells.every((c) => c.trim() === "")) continue;
    const record: Record<string, string> = {};
    columns.forEach((column, i) => {
      if (column) record[column] = cells[i] ?? "";
    });
    records.push(record);
  }
  return records;
}

export class GoogleSheetSource implements SheetSource {
  private readonly sheets: sheets_v4.Sheets;

  constructor(
    private readonly spreadsheetId: string,
    credentialsPath?: string,
  ) {
    const auth = new google.auth.GoogleAuth({
      keyFile: credentialsPath,
      scopes: [READONLY_SCOPE],
    });
    this.sheets = google.sheets({ version: "v4", auth });
  }

  async readRecords(tab: string): Promise<DirectoryRow[]> {
    return recordsFromValues(await this.readValues(tab));
  }

  async readFirstColumn(tab: string): Promise<string[]> {
    const values = await this.readValues(`${tab}!A:A`);
    return values
      .map((row) => String(row[0] ?? "").trim())
      .filter((value) => value.length > 0);
  }

  private async readValues(range: string): Promise<unknown[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
    });
    return res.data.values ?? [];
  }
}

/** Used when no spreadsheet is configured. Reads fail, so searches come back empty. */
export class UnconfiguredSheetSource implements SheetSource {
  async readRecords(): Promise<DirectoryRow[]> {
    throw new Error("directory.sheetId is not configured");
  }

  async readFirstColumn(): Promise<string[]> {
    throw new Error("directory.sheetId is not configured");
  }
}
