/**
 * Content Preprocessor
 *
 * Bounds externally fetched content before it reaches the model prompt:
 * short text passes through untouched; long text is chunked, each chunk
 * condensed concurrently, and the condensed chunks are integrated into a
 * single article no longer than `maxSynthesisChars`. The reduction is lossy.
 */

import { chunkOnDelimiter } from './chunker.js';
import { PreprocessingError, TurnCancelledError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runTaskGroup } from '../utils/task-group.js';
import { linkSignals } from '../utils/timeout.js';
import { sliceWhole } from '../utils/text.js';

const log = logger.child('preprocess');

/**
 * Summarisation collaborator.
 */
export interface ContentCondenser {
  condense(text: string, signal?: AbortSignal): Promise<string>;
  synthesize(sections: readonly string[], maxChars: number, signal?: AbortSignal): Promise<string>;
}

export interface ContentChunk {
  sourceId: string;
  ordinal: number;
  rawText: string;
}

export interface CondensedChunk {
  ordinal: number;
  condensedText: string;
  /** True when condensation failed and the raw chunk text stands in. */
  fallback: boolean;
}

export interface ContentPreprocessorConfig {
  condenser: ContentCondenser;
  /** Budget for each chunk's condensation call. */
  condenseTimeoutMs?: number;
}

export interface ProcessOptions {
  sourceId?: string;
  signal?: AbortSignal;
}

/**
 * Cut to `maxChars`, preferring the last whitespace in the final fifth.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const hardCut = sliceWhole(text, maxChars);
  const lastSpace = hardCut.search(/\s\S*$/);
  if (lastSpace >= Math.floor(maxChars * 0.8)) {
    return hardCut.slice(0, lastSpace);
  }
  return hardCut;
}

export class ContentPreprocessor {
  private condenser: ContentCondenser;
  private condenseTimeoutMs?: number;

  constructor(config: ContentPreprocessorConfig) {
    this.condenser = config.condenser;
    this.condenseTimeoutMs = config.condenseTimeoutMs;
  }

  async process(
    rawText: string,
    singleChunkThreshold: number,
    maxSynthesisChars: number,
    options: ProcessOptions = {}
  ): Promise<string> {
    if (rawText.length <= singleChunkThreshold) {
      log.debug(`Short content (${rawText.length} chars), passing through`);
      return rawText;
    }

    const sourceId = options.sourceId ?? 'content';
    const chunks = this.splitIntoChunks(rawText, singleChunkThreshold, sourceId);
    log.info(`Processing ${sourceId}: ${chunks.length} chunks from ${rawText.length} characters`);

    const condensed = await this.condenseAll(chunks, options.signal);
    const sections = [...condensed]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map(chunk => chunk.condensedText);

    throwIfAborted(options.signal);

    let article: string;
    try {
      article = await this.condenser.synthesize(sections, maxSynthesisChars, options.signal);
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        throw error;
      }
      throw new PreprocessingError(`Synthesis failed for ${sourceId}: ${errorMessage(error)}`);
    }

    const bounded = truncateText(article.trim(), maxSynthesisChars);
    log.info(`Content processing completed for ${sourceId}: ${rawText.length} -> ${bounded.length} characters`);
    return bounded;
  }

  splitIntoChunks(rawText: string, singleChunkThreshold: number, sourceId: string): ContentChunk[] {
    return chunkOnDelimiter(rawText, singleChunkThreshold).map((text, ordinal) => ({
      sourceId,
      ordinal,
      rawText: text,
    }));
  }

  /**
   * Condense every chunk concurrently. A failed or timed-out chunk keeps
   * its raw text so nothing is dropped silently. Result order is by ordinal.
   */
  async condenseAll(chunks: readonly ContentChunk[], signal?: AbortSignal): Promise<CondensedChunk[]> {
    const outcomes = await runTaskGroup(
      chunks.map(chunk => taskSignal => this.condenser.condense(chunk.rawText, linkSignals(signal, taskSignal))),
      { timeoutMs: this.condenseTimeoutMs }
    );

    throwIfAborted(signal);

    return outcomes.map(outcome => {
      const chunk = chunks[outcome.index];
      if (outcome.status === 'fulfilled') {
        return { ordinal: chunk.ordinal, condensedText: outcome.value, fallback: false };
      }
      log.warn(`Condensation failed for ${chunk.sourceId} chunk ${chunk.ordinal}, keeping raw text: ${errorMessage(outcome.reason)}`);
      return { ordinal: chunk.ordinal, condensedText: chunk.rawText, fallback: true };
    });
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}
