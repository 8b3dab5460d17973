import * as path from 'path';
import { UNKNOWN_TAG, type EnvironmentPattern, type EnvironmentTag } from '@inventory/core';

export const CLIENT_SEGMENT_PREFIXES = ['client-', 'Client-'] as const;
export const ENVIRONMENT_KEYWORDS = ['prod', 'dev', 'test', 'staging'] as const;

export type ClassifierOptions = {
  patterns: readonly EnvironmentPattern[];
  /** Paths under this directory are classified relative to it */
  root?: string;
};

/**
 * Infers environment/client/datacenter from a file path.
 * Total: every field falls back to "unknown".
 */
export class EnvironmentClassifier {
  private readonly patterns: readonly EnvironmentPattern[];
  private readonly root?: string;

  constructor(options: ClassifierOptions) {
    this.patterns = options.patterns;
    this.root = options.root ? path.resolve(options.root) : undefined;
  }

  classify(filePath: string): EnvironmentTag {
    const tag: EnvironmentTag = {
      environment: UNKNOWN_TAG,
      client: UNKNOWN_TAG,
      datacenter: UNKNOWN_TAG
    };
    const target = this.toPosix(this.relativeToRoot(filePath));

    const match = this.patterns.find((entry) => target.includes(entry.pattern));
    if (match) {
      return {
        environment: match.environment ?? tag.environment,
        client: match.client ?? tag.client,
        datacenter: match.datacenter ?? tag.datacenter
      };
    }

    for (const segment of this.directorySegments(target)) {
      if (CLIENT_SEGMENT_PREFIXES.some((prefix) => segment.startsWith(prefix))) {
        tag.client = segment;
      }
      if (ENVIRONMENT_KEYWORDS.some((keyword) => segment.includes(keyword))) {
        tag.environment = segment;
      }
    }

    return tag;
  }

  private relativeToRoot(filePath: string): string {
    if (!this.root) return filePath;

    const relative = path.relative(this.root, path.resolve(filePath));
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      return filePath;
    }
    return relative;
  }

  private toPosix(filePath: string): string {
    return filePath.split(path.sep).join('/');
  }

  private directorySegments(posixPath: string): string[] {
    return posixPath
      .split('/')
      .slice(0, -1)
      .filter((segment) => segment.length > 0 && segment !== '.');
  }
}
