import * as path from 'path';
import type { ExportFormat } from '@inventory/core';
import type { Table } from './columns';
import { writeCsv } from './csv-writer';
import { writeExcel } from './excel-writer';
import { writeJsonRecords } from './json-writer';

const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  csv: '.csv',
  excel: '.xlsx',
  json: '.json'
};

/**
 * Writes one collection in every configured encoding
 */
export class ArtifactExporter {
  constructor(
    private readonly outputDirectory: string,
    private readonly formats: readonly ExportFormat[]
  ) {}

  /**
   * Each path is appended to `written` as soon as its file is complete,
   * so a failure part-way still reports what exists on disk.
   */
  async exportTable(
    baseName: string,
    sheetName: string,
    table: Table,
    written: string[]
  ): Promise<void> {
    for (const format of this.formats) {
      const filePath = path.join(this.outputDirectory, `${baseName}${FORMAT_EXTENSIONS[format]}`);

      switch (format) {
        case 'csv':
          await writeCsv(filePath, table);
          break;
        case 'excel':
          await writeExcel(filePath, sheetName, table);
          break;
        case 'json':
          await writeJsonRecords(filePath, table);
          break;
      }

      written.push(filePath);
    }
  }
}
