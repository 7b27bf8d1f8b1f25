import { createHash } from 'node:crypto';

import { parseReportText } from './parse';
import type { ParsedReport } from './types';

type CachedReport = {
  digest: string;
  report: ParsedReport;
};

export function contentDigest(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/** Memoizes parsed reports per file; a changed file is parsed again. */
export class ParseCache {
  private cache = new Map<string, CachedReport>();

  private parses = 0;

  get(identity: string, content: string): ParsedReport {
    const digest = contentDigest(content);
    const hit = this.cache.get(identity);
    if (hit && hit.digest === digest) {
      return hit.report;
    }
    const report = parseReportText(content);
    this.parses += 1;
    this.cache.set(identity, { digest, report });
    return report;
  }

  has(identity: string): boolean {
    return this.cache.has(identity);
  }

  get parseCount(): number {
    return this.parses;
  }

  clear(): void {
    this.cache.clear();
  }
}
