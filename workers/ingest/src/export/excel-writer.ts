import ExcelJS from 'exceljs';
import { SPREADSHEET_MAX_COLUMN_WIDTH } from '@inventory/core';
import { cellText, type Table } from './columns';

const HEADER_FILL_ARGB = 'FF366092';
const HEADER_FONT_ARGB = 'FFFFFFFF';

/**
 * Widest rendered value per column (header included), padded by 2 and capped
 */
export function fitColumnWidths(table: Table): number[] {
  return table.columns.map((column) => {
    const longest = table.rows.reduce(
      (max, row) => Math.max(max, cellText(row[column] ?? null).length),
      column.length
    );
    return Math.min(longest + 2, SPREADSHEET_MAX_COLUMN_WIDTH);
  });
}

/**
 * Write a single-sheet workbook with a styled header row
 */
export async function writeExcel(filePath: string, sheetName: string, table: Table): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);

  sheet.addRow([...table.columns]);
  for (const row of table.rows) {
    sheet.addRow(table.columns.map((column) => row[column] ?? null));
  }

  sheet.getRow(1).eachCell((cell) => {
    cell.font = { bold: true, color: { argb: HEADER_FONT_ARGB } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
  });

  fitColumnWidths(table).forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });

  await workbook.xlsx.writeFile(filePath);
}
