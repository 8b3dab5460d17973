import { promises as fs } from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createTempDir, removeDir } from '@inventory/test-utils';
import type { Table } from '../src/export/columns';
import { writeCsv } from '../src/export/csv-writer';
import { fitColumnWidths, writeExcel } from '../src/export/excel-writer';
import { buildBaseName, buildSummaryName, sanitizeNameComponent } from '../src/export/file-naming';
import { writeJsonRecords } from '../src/export/json-writer';

const timestamp = new Date(2024, 0, 15, 10, 30, 45);
const jobId = '123e4567-e89b-12d3-a456-426614174000';

describe('file naming', () => {
  it('should join kind, tags, timestamp and job ref', () => {
    expect(buildBaseName({ kind: 'vms', client: 'client a', environment: 'prod/east', timestamp, jobId }))
      .toBe('inventory_vms_client_a_prod_east_20240115_103045_123e4567');
  });

  it('should omit the tag pair when either is missing', () => {
    expect(buildBaseName({ kind: 'alarms', client: null, environment: 'production', timestamp, jobId }))
      .toBe('inventory_alarms_20240115_103045_123e4567');
  });

  it('should name the summary per job', () => {
    expect(buildSummaryName(timestamp, jobId)).toBe('processing_summary_20240115_103045_123e4567.json');
  });

  it('should fall back when nothing printable remains', () => {
    expect(sanitizeNameComponent('***')).toBe('unknown');
    expect(sanitizeNameComponent('client-a.eu')).toBe('client-a.eu');
  });
});

describe('writers', () => {
  let dir: string;

  const table: Table = {
    columns: ['name', 'cpu_count', 'is_powered_on', 'triggered_time'],
    rows: [
      { name: 'web-01', cpu_count: 4, is_powered_on: true, triggered_time: new Date('2024-01-15T10:00:00.000Z') },
      { name: 'db-01', cpu_count: 0, is_powered_on: false, triggered_time: null }
    ]
  };

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should write CSV with a header row', async () => {
    const filePath = path.join(dir, 'out.csv');
    await writeCsv(filePath, table);

    const lines = (await fs.readFile(filePath, 'utf-8')).split(/\r?\n/);
    expect(lines).toEqual([
      '"name","cpu_count","is_powered_on","triggered_time"',
      '"web-01","4","true","2024-01-15T10:00:00.000Z"',
      '"db-01","0","false",""'
    ]);
  });

  it('should write JSON records with ISO timestamps', async () => {
    const filePath = path.join(dir, 'out.json');
    await writeJsonRecords(filePath, table);

    expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual([
      { name: 'web-01', cpu_count: 4, is_powered_on: true, triggered_time: '2024-01-15T10:00:00.000Z' },
      { name: 'db-01', cpu_count: 0, is_powered_on: false, triggered_time: null }
    ]);
  });

  it('should size columns to content with a cap', () => {
    const widths = fitColumnWidths({
      columns: ['name', 'description'],
      rows: [{ name: 'web-01', description: 'x'.repeat(80) }]
    });

    expect(widths).toEqual([8, 50]);
  });

  it('should write the rows in the named sheet', async () => {
    const filePath = path.join(dir, 'out.xlsx');
    await writeExcel(filePath, 'VM_Details', table);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet('VM_Details');

    expect(sheet).toBeDefined();
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(1).value).toBe('name');
    expect(sheet?.getRow(2).getCell(1).value).toBe('web-01');
    expect(sheet?.getRow(2).getCell(2).value).toBe(4);
  });

  it('should style every header cell and size columns with a cap of 50', async () => {
    const filePath = path.join(dir, 'styled.xlsx');
    await writeExcel(filePath, 'VM_Alarms', {
      columns: ['name', 'summary', 'description'],
      rows: [{ name: 'web-01', summary: 's'.repeat(47), description: 'd'.repeat(60) }]
    });

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet('VM_Alarms');
    expect(sheet).toBeDefined();

    for (const column of [1, 2, 3]) {
      const cell = sheet?.getRow(1).getCell(column);
      expect(cell?.font).toMatchObject({ bold: true, color: { argb: 'FFFFFFFF' } });
      expect(cell?.fill).toMatchObject({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF366092' } });
      expect(cell?.alignment).toMatchObject({ horizontal: 'center', vertical: 'middle' });
    }

    expect([1, 2, 3].map((column) => sheet?.getColumn(column).width)).toEqual([8, 49, 50]);
    expect(sheet?.getRow(2).getCell(3).value).toBe('d'.repeat(60));
  });
});
