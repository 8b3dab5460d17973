import { promises as fs } from 'fs';
import type { Table } from './columns';

/**
 * Write a table as an array of records.
 * Dates serialize as ISO-8601 through Date#toJSON.
 */
export async function writeJsonRecords(filePath: string, table: Table): Promise<void> {
  await writeJson(filePath, table.rows);
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}
