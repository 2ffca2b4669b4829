// Mirrors step counts and medals into a Google Sheet grid.
//
// Expected layout (first worksheet row is the header):
//   Nick   | 01.05.2024 | 02.05.2024 | ...
//   alice  | 8500       | 12000 🥇   | ...
// Missing nickname rows and date columns are appended.

import { google, sheets_v4 } from "googleapis";
import { formatDisplayDate, IsoDate } from "./dates";
import { appendMedalSymbol, stripMedalSymbols } from "./formatUtils";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];
const NICK_HEADER = "Nick";

/**
 * A grid-style surface addressed by (nickname, date).
 */
export interface CellSink {
  writeSteps(nickname: string, date: IsoDate, steps: number): Promise<void>;
  writeMedal(nickname: string, date: IsoDate, symbol: string): Promise<void>;
  clearMedal(nickname: string, date: IsoDate): Promise<void>;
}

export interface CellUpdate {
  row: number;       // 0-based
  column: number;    // 0-based
  value: string | number;
}

/**
 * Where a (nickname, date) value goes, plus the header and nickname cells to
 * create first when the grid does not have them yet.
 */
export interface CellPlan {
  row: number;
  column: number;
  setup: CellUpdate[];
}

/**
 * Locates the cell for a nickname (case-insensitive) and date header.
 * @param values Current grid contents, row-major
 * @param nickname Row key
 * @param header Column key (DD.MM.YYYY)
 */
export function planCell(values: readonly string[][], nickname: string, header: string): CellPlan {
  const setup: CellUpdate[] = [];
  const headers = values.length > 0 ? [...values[0]] : [];
  let rowCount = values.length;
  if (rowCount === 0) {
    setup.push({ row: 0, column: 0, value: NICK_HEADER });
    headers.push(NICK_HEADER);
    rowCount = 1;
  }

  let column = headers.indexOf(header);
  if (column === -1) {
    column = headers.length;
    setup.push({ row: 0, column, value: header });
  }

  const wanted = nickname.toLowerCase();
  let row = values.findIndex((cells, i) => i > 0 && (cells[0] ?? "").toLowerCase() === wanted);
  if (row === -1) {
    row = rowCount;
    setup.push({ row, column: 0, value: nickname });
  }

  return { row, column, setup };
}

/**
 * Converts 0-based coordinates to A1 notation (row 0, column 27 -> AB1).
 */
export function toA1(row: number, column: number): string {
  let letters = "";
  let n = column + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return `${letters}${row + 1}`;
}

/**
 * Google Sheets implementation of CellSink.
 */
export class SheetsService implements CellSink {
  private readonly sheets: sheets_v4.Sheets;
  private readonly sheetRef: string;

  constructor(credentialsPath: string, private readonly spreadsheetId: string, worksheet: string) {
    const auth = new google.auth.GoogleAuth({ keyFile: credentialsPath, scopes: SCOPES });
    this.sheets = google.sheets({ version: "v4", auth });
    this.sheetRef = `'${worksheet.replace(/'/g, "''")}'`;
  }

  async writeSteps(nickname: string, date: IsoDate, steps: number): Promise<void> {
    const plan = planCell(await this.readGrid(), nickname, formatDisplayDate(date));
    await this.writeCells([...plan.setup, { row: plan.row, column: plan.column, value: steps }]);
    console.log(`[Steps] SheetsService: Wrote ${steps} for ${nickname} on ${date} at ${toA1(plan.row, plan.column)}`);
  }

  async writeMedal(nickname: string, date: IsoDate, symbol: string): Promise<void> {
    const values = await this.readGrid();
    const plan = planCell(values, nickname, formatDisplayDate(date));
    const current = values[plan.row]?.[plan.column] ?? "";
    const annotated = appendMedalSymbol(current, symbol);
    await this.writeCells([...plan.setup, { row: plan.row, column: plan.column, value: annotated }]);
  }

  async clearMedal(nickname: string, date: IsoDate): Promise<void> {
    const values = await this.readGrid();
    const plan = planCell(values, nickname, formatDisplayDate(date));
    // No row or column yet means there is no symbol to clear
    if (plan.setup.length > 0) return;
    const current = values[plan.row]?.[plan.column] ?? "";
    const cleared = stripMedalSymbols(current);
    if (cleared === current) return;
    await this.writeCells([{ row: plan.row, column: plan.column, value: cleared }]);
  }

  private async readGrid(): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: this.sheetRef,
    });
    return (res.data.values ?? []).map((row) => row.map((cell) => String(cell)));
  }

  private async writeCells(updates: CellUpdate[]): Promise<void> {
    await this.sheets.spreadsheets.values.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        valueInputOption: "RAW",
        data: updates.map((u) => ({
          range: `${this.sheetRef}!${toA1(u.row, u.column)}`,
          values: [[u.value]],
        })),
      },
    });
  }
}
