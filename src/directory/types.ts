/** One spreadsheet row keyed by the header row. Cells are kept as text. */
export type DirectoryRow = Readonly<Record<string, string>>;

export interface Professional extends DirectoryRow {
  readonly availability: string;
}

/** Where directory rows come from. */
export interface SheetSource {
  /** Rows of `tab`, keyed by its first row. */
  readRecords(tab: string): Promise<DirectoryRow[]>;
  /** Non-empty cells of the first column of `tab`. */
  readFirstColumn(tab: string): Promise<string[]>;
}
