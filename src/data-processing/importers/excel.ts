// Excel parsing: every worksheet of a workbook as header-keyed rows

import ExcelJS from 'exceljs';

/** A cell reduced to what the importers consume; empty and error cells are null */
export type CellScalar = string | number | null;

export type RawRow = Record<string, CellScalar>;

export interface ParsedSheet {
  /** Header texts in column order */
  headers: string[];
  rows: RawRow[];
}

/** Reduce an ExcelJS cell value to a string or number. */
export function cellToScalar(value: ExcelJS.CellValue): CellScalar {
  if (value == null) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if ('richText' in value) return cellToScalar(value.richText.map((rt) => rt.text).join(''));
  if ('error' in value) return null;
  if ('result' in value) return value.result === undefined ? null : cellToScalar(value.result);
  if ('text' in value) return cellToScalar(value.text);
  return null;
}

function parseWorksheet(worksheet: ExcelJS.Worksheet): ParsedSheet {
  const headers: string[] = [];
  const rows: RawRow[] = [];

  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      row.eachCell((cell, colNumber) => {
        const header = cellToScalar(cell.value);
        headers[colNumber - 1] = header === null ? '' : String(header);
      });
      return;
    }
    const obj: RawRow = {};
    row.eachCell((cell, colNumber) => {
      const header = headers[colNumber - 1];
      if (header) obj[header] = cellToScalar(cell.value);
    });
    if (Object.values(obj).some((v) => v !== null)) rows.push(obj);
  });

  return { headers: Array.from(headers, (h) => h ?? ''), rows };
}

/** Parse every worksheet, keyed by worksheet name */
export async function parseWorkbook(data: ArrayBuffer): Promise<Map<string, ParsedSheet>> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  const sheets = new Map<string, ParsedSheet>();
  for (const worksheet of workbook.worksheets) {
    sheets.set(worksheet.name, parseWorksheet(worksheet));
  }
  return sheets;
}
