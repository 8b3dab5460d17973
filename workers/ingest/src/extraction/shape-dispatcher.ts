import type { DocumentShape } from '@inventory/core';
import { isRecord, type JsonRecord } from './field-resolver';

/**
 * Leaf result objects recovered from one recognised top-level shape
 */
export type ShapeMatch = {
  shape: DocumentShape;
  leaves: JsonRecord[];
  skipped: number;
};

type ShapeHandler = {
  shape: DocumentShape;
  matches: (document: unknown) => boolean;
  collect: (document: unknown) => Omit<ShapeMatch, 'shape'>;
};

/**
 * Keep object entries, count everything else as skipped
 */
function partitionRecords(items: unknown[]): Omit<ShapeMatch, 'shape'> {
  const leaves: JsonRecord[] = [];
  let skipped = 0;
  for (const item of items) {
    if (isRecord(item)) {
      leaves.push(item);
    } else {
      skipped++;
    }
  }
  return { leaves, skipped };
}

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

/**
 * plays[].tasks[].hosts{host: result}
 */
const playbookHandler: ShapeHandler = {
  shape: 'playbook',
  matches: (document) => isRecord(document) && 'plays' in document,
  collect: (document) => {
    const leaves: JsonRecord[] = [];
    let skipped = 0;
    const plays = isRecord(document) ? asList(document.plays) : [];

    for (const play of plays) {
      if (!isRecord(play)) {
        skipped++;
        continue;
      }
      for (const task of asList(play.tasks)) {
        if (!isRecord(task)) {
          skipped++;
          continue;
        }
        if (task.hosts === undefined || task.hosts === null) continue;
        if (!isRecord(task.hosts)) {
          skipped++;
          continue;
        }
        const hostResults = partitionRecords(Object.values(task.hosts));
        leaves.push(...hostResults.leaves);
        skipped += hostResults.skipped;
      }
    }

    return { leaves, skipped };
  }
};

/**
 * results: [result, ...] or results: result
 */
const resultsHandler: ShapeHandler = {
  shape: 'results',
  matches: (document) => isRecord(document) && 'results' in document,
  collect: (document) => partitionRecords(isRecord(document) ? asList(document.results) : [])
};

const factsHandler: ShapeHandler = {
  shape: 'facts',
  matches: (document) => isRecord(document) && 'ansible_facts' in document,
  collect: (document) => partitionRecords(isRecord(document) ? asList(document.ansible_facts) : [])
};

/**
 * Fallback: the document itself, or each element of a top-level list
 */
const directHandler: ShapeHandler = {
  shape: 'direct',
  matches: () => true,
  collect: (document) => {
    if (Array.isArray(document)) return partitionRecords(document);
    if (isRecord(document)) return { leaves: [document], skipped: 0 };
    return { leaves: [], skipped: document === null || document === undefined ? 0 : 1 };
  }
};

const SHAPE_HANDLERS: readonly ShapeHandler[] = [
  playbookHandler,
  resultsHandler,
  factsHandler,
  directHandler
];

/**
 * Discriminate the document's top-level shape and reduce it to leaf result objects
 */
export function resolveLeaves(document: unknown): ShapeMatch {
  for (const handler of SHAPE_HANDLERS) {
    if (handler.matches(document)) {
      return { shape: handler.shape, ...handler.collect(document) };
    }
  }
  return { shape: 'direct', leaves: [], skipped: 0 };
}
