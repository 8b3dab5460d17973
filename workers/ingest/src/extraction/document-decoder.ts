import { promises as fs } from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { InputDecodeError, SUPPORTED_EXTENSIONS } from '@inventory/core';

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function isSupportedExtension(extension: string): extension is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension.toLowerCase());
}

export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Decode JSON or YAML text into plain data
 */
export function decodeDocument(content: string, extension: string): unknown {
  const ext = extension.toLowerCase();
  if (!isSupportedExtension(ext)) {
    throw new InputDecodeError(`Unsupported file format: ${ext || '(none)'}`, { extension: ext });
  }

  // Strip a UTF-8 BOM left by some exporters
  const text = content.replace(/^\uFEFF/, '');

  try {
    return ext === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputDecodeError(`Invalid ${ext === '.json' ? 'JSON' : 'YAML'}: ${reason}`, {
      extension: ext
    });
  }
}

/**
 * Read and decode a source file
 */
export async function readDocument(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputDecodeError(`Cannot read ${filePath}: ${reason}`, { filePath });
  }
  return decodeDocument(content, fileExtension(filePath));
}
