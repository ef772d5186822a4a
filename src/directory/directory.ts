import type { Logger } from "../logging/logger.js";
import { findProfessionalByName, findProfessionals } from "./search.js";
import type { DirectoryRow, Professional, SheetSource } from "./types.js";

/** Spreadsheet-backed directory of professionals. Source failures read as "nothing found". */
export class ProfessionalDirectory {
  constructor(
    private readonly source: SheetSource,
    private readonly tab: string,
    private readonly logger: Logger,
  ) {}

  async findProfessionals(specialty: string, city: string): Promise<DirectoryRow[]> {
    const rows = await this.rows();
    if (!rows) return [];
    const matches = findProfessionals(rows, specialty, city);
    this.logger.info(
      { specialty, city, scanned: rows.length, matches: matches.length },
      "Directory search",
    );
    return matches;
  }

  async findByName(name: string): Promise<Professional | null> {
    const rows = await this.rows();
    if (!rows) return null;
    const match = findProfessionalByName(rows, name);
    this.logger.info({ name, found: match !== null }, "Directory lookup by name");
    return match;
  }

  private async rows(): Promise<DirectoryRow[] | null> {
    try {
      return await this.source.readRecords(this.tab);
    } catch (err) {
      this.logger.error({ err, tab: this.tab }, "Failed to read directory sheet");
      return null;
    }
  }
}
