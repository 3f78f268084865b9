import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { performance } from "node:perf_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { DEFAULT_CHUNK_BYTES, DEFAULT_PROGRESS_INTERVAL } from "./config.js";
import { WordNetError, WordNetIoError } from "./errors.js";
import { iterateXmlEvents, streamXmlEvents, type XmlEvent } from "./events.js";
import type { StructuredLogger } from "./logger.js";
import type { LexicalGraph } from "./model.js";
import { WordNetParser } from "./parser.js";

export interface LoadOptions {
  /** Receives start/progress/completion entries when provided. */
  readonly logger?: StructuredLogger;
  /** Elements between two `wordnet_load_progress` entries; `0` disables them. */
  readonly progressInterval?: number;
  /** Bytes read from the file (or characters fed from a string) per step. */
  readonly chunkBytes?: number;
}

/**
 * Parses an in-memory document. The whole graph is returned at once; any
 * error aborts the parse and no partial graph escapes.
 */
export function parseWordNet(source: string, options: LoadOptions = {}): LexicalGraph {
  const session = new LoadSession("<memory>", options);
  try {
    for (const event of iterateXmlEvents(source, { chunkSize: options.chunkBytes })) {
      session.consume(event);
    }
    return session.finish();
  } catch (error) {
    session.fail(error);
    throw error;
  }
}

/**
 * Streams a document from disk through the parser. Only the current read
 * chunk and the entities themselves are held in memory.
 */
export async function loadWordNet(path: string, options: LoadOptions = {}): Promise<LexicalGraph> {
  const session = new LoadSession(path, options);
  try {
    await ensureReadable(path);
    const stream = createReadStream(path, { highWaterMark: options.chunkBytes ?? DEFAULT_CHUNK_BYTES });
    try {
      for await (const event of streamXmlEvents(stream)) {
        session.consume(event);
      }
    } catch (error) {
      throw error instanceof WordNetError ? error : new WordNetIoError(path, error);
    } finally {
      stream.destroy();
    }
    return session.finish();
  } catch (error) {
    session.fail(error);
    throw error;
  }
}

async function ensureReadable(path: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new Error("not a regular file");
    }
  } catch (error) {
    throw new WordNetIoError(path, error);
  }
}

/** Couples one parser run with its log entries. */
class LoadSession {
  private readonly parser = new WordNetParser();
  private readonly logger?: StructuredLogger;
  private readonly progressInterval: number;
  private readonly startedAt = performance.now();
  private nextProgressAt: number;

  constructor(
    private readonly source: string,
    options: LoadOptions,
  ) {
    this.logger = options.logger;
    this.progressInterval = Math.max(0, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
    this.nextProgressAt = this.progressInterval;
    this.logger?.info("wordnet_load_started", { source });
  }

  consume(event: XmlEvent): void {
    this.parser.consume(event);
    if (this.progressInterval > 0 && this.parser.elementCount >= this.nextProgressAt) {
      this.nextProgressAt += this.progressInterval;
      this.logger?.debug("wordnet_load_progress", {
        source: this.source,
        elements: this.parser.elementCount,
        duration_ms: this.elapsed(),
      });
    }
  }

  finish(): LexicalGraph {
    const graph = this.parser.finish();
    this.logger?.info("wordnet_load_completed", {
      source: this.source,
      version: graph.version,
      lexical_units: graph.lexicalUnits.size,
      synsets: graph.synsets.size,
      relation_types: graph.relationTypes.size,
      lexical_relations: graph.lexicalRelations.length,
      synset_relations: graph.synsetRelations.length,
      duration_ms: this.elapsed(),
    });
    return graph;
  }

  fail(error: unknown): void {
    this.logger?.error("wordnet_load_failed", {
      source: this.source,
      code: error instanceof WordNetError ? error.code : null,
      message: error instanceof Error ? error.message : String(error),
      elements: this.parser.elementCount,
    });
  }

  private elapsed(): number {
    return Math.round(performance.now() - this.startedAt);
  }
}
