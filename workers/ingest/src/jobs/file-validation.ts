import { promises as fs, type Stats } from 'fs';
import * as path from 'path';
import { InputDecodeError, SourceMissingError, type DocumentShape } from '@inventory/core';
import { fileExtension, isSupportedExtension, readDocument } from '../extraction/document-decoder';
import type { InventoryExtractor } from '../extraction/extractor';

export type FileValidationReport = {
  path: string;
  extension: string;
  sizeBytes: number;
  supported: boolean;
  withinSizeLimit: boolean;
  valid: boolean;
  shape: DocumentShape | null;
  vmCount: number;
  alarmCount: number;
  skippedEntries: number;
  error: string | null;
};

/**
 * Dry run of intake checks and extraction. Creates no job and writes nothing.
 */
export async function validateFile(
  filePath: string,
  extractor: InventoryExtractor,
  maxFileSizeMb: number
): Promise<FileValidationReport> {
  const absolutePath = path.resolve(filePath);

  let stats: Stats;
  try {
    stats = await fs.stat(absolutePath);
  } catch {
    throw new SourceMissingError(absolutePath);
  }
  if (!stats.isFile()) {
    throw new SourceMissingError(absolutePath);
  }
  const sizeBytes = stats.size;

  const extension = fileExtension(absolutePath);
  const report: FileValidationReport = {
    path: absolutePath,
    extension,
    sizeBytes,
    supported: isSupportedExtension(extension),
    withinSizeLimit: sizeBytes <= maxFileSizeMb * 1024 * 1024,
    valid: false,
    shape: null,
    vmCount: 0,
    alarmCount: 0,
    skippedEntries: 0,
    error: null
  };

  if (!report.supported) {
    return { ...report, error: `Unsupported file format: ${extension || '(none)'}` };
  }
  if (!report.withinSizeLimit) {
    return { ...report, error: `File exceeds ${maxFileSizeMb} MB` };
  }

  try {
    const { metadata } = extractor.extract(await readDocument(absolutePath));
    return {
      ...report,
      valid: true,
      shape: metadata.shape,
      vmCount: metadata.total_vms,
      alarmCount: metadata.total_alarms,
      skippedEntries: metadata.skipped_entries
    };
  } catch (error) {
    if (error instanceof InputDecodeError) {
      return { ...report, error: error.message };
    }
    throw error;
  }
}
