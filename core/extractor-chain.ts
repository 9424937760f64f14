/**
 * Ordered chains of fallible extractors.
 *
 * Each extractor returns a value or `null`; a chain stops at the first
 * non-null value. An extractor that throws is logged and treated as a miss,
 * except for run aborts which always propagate.
 */

import { isRunAborted } from './errors';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('ExtractorChain');

export interface Extractor<I, O> {
  name: string;
  extract(input: I): Promise<O | null>;
}

export interface SyncExtractor<I, O> {
  name: string;
  extract(input: I): O | null;
}

export interface ExtractionHit<O> {
  value: O;
  source: string;
}

function onExtractorError(name: string, error: unknown): void {
  if (isRunAborted(error)) throw error;
  logger.debug(`Extractor ${name} failed`, {
    error: error instanceof Error ? error.message : String(error),
  });
}

export class ExtractorChain<I, O> {
  private readonly extractors: Extractor<I, O>[];

  constructor(extractors: Extractor<I, O>[] = []) {
    this.extractors = [...extractors];
  }

  add(extractor: Extractor<I, O>): this {
    this.extractors.push(extractor);
    return this;
  }

  names(): string[] {
    return this.extractors.map((e) => e.name);
  }

  async run(input: I): Promise<ExtractionHit<O> | null> {
    for (const extractor of this.extractors) {
      try {
        const value = await extractor.extract(input);
        if (value !== null) {
          return { value, source: extractor.name };
        }
      } catch (error) {
        onExtractorError(extractor.name, error);
      }
    }
    return null;
  }
}

export class SyncExtractorChain<I, O> {
  private readonly extractors: SyncExtractor<I, O>[];

  constructor(extractors: SyncExtractor<I, O>[] = []) {
    this.extractors = [...extractors];
  }

  names(): string[] {
    return this.extractors.map((e) => e.name);
  }

  run(input: I): ExtractionHit<O> | null {
    for (const extractor of this.extractors) {
      try {
        const value = extractor.extract(input);
        if (value !== null) {
          return { value, source: extractor.name };
        }
      } catch (error) {
        onExtractorError(extractor.name, error);
      }
    }
    return null;
  }
}
