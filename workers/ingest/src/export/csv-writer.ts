import { promises as fs } from 'fs';
import { Parser } from 'json2csv';
import { cellText, type Table } from './columns';

/**
 * Write a table as comma-delimited text with a header row
 */
export async function writeCsv(filePath: string, table: Table): Promise<void> {
  const parser = new Parser<Record<string, string>>({
    fields: [...table.columns],
    header: true
  });

  const rows = table.rows.map((row) => {
    const flat: Record<string, string> = {};
    for (const column of table.columns) {
      flat[column] = cellText(row[column] ?? null);
    }
    return flat;
  });

  await fs.writeFile(filePath, parser.parse(rows), 'utf-8');
}
