import { Buffer } from "node:buffer";
import { StringDecoder } from "node:string_decoder";
import sax from "sax";
import type { QualifiedAttribute, QualifiedTag, SAXParser, Tag } from "sax";

import { MalformedXmlError } from "./errors.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export enum XmlEventKind {
  Start = "START",
  Empty = "EMPTY",
  Text = "TEXT",
  End = "END",
  Eof = "EOF",
}

/** Attribute values keyed by their exact (case-sensitive) name. */
export type XmlAttributes = Readonly<Record<string, string | undefined>>;

/** Opening or self-closing element. */
export interface XmlElement {
  readonly tag: string;
  readonly attributes: XmlAttributes;
}

export type XmlEvent =
  | { readonly kind: XmlEventKind.Start; readonly element: XmlElement }
  | { readonly kind: XmlEventKind.Empty; readonly element: XmlElement }
  | { readonly kind: XmlEventKind.Text; readonly text: string }
  | { readonly kind: XmlEventKind.End; readonly tag: string }
  | { readonly kind: XmlEventKind.Eof };

/** Default number of characters handed to the tokenizer per write. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface XmlEventOptions {
  /** Characters fed to the tokenizer per step when iterating an in-memory string. */
  readonly chunkSize?: number;
}

/**
 * Push-style adapter around the `sax` tokenizer. Chunks are written in, the
 * resulting events are queued and handed out by {@link drain}. The adapter
 * folds the open/close pair `sax` reports for `<tag/>` into one
 * {@link XmlEventKind.Empty} event.
 */
export class XmlEventSource {
  private readonly parser: SAXParser;
  private queue: XmlEvent[] = [];
  private pendingSelfClose = false;
  private failure: MalformedXmlError | null = null;
  private closed = false;

  constructor() {
    this.parser = sax.parser(true, { trim: false, normalize: false });
    this.parser.onopentag = (tag: Tag | QualifiedTag) => {
      const element: XmlElement = { tag: tag.name, attributes: toAttributes(tag) };
      if (tag.isSelfClosing) {
        this.pendingSelfClose = true;
        this.queue.push({ kind: XmlEventKind.Empty, element });
      } else {
        this.queue.push({ kind: XmlEventKind.Start, element });
      }
    };
    this.parser.onclosetag = (tagName: string) => {
      if (this.pendingSelfClose) {
        this.pendingSelfClose = false;
        return;
      }
      this.queue.push({ kind: XmlEventKind.End, tag: tagName });
    };
    this.parser.ontext = (text: string) => {
      this.queue.push({ kind: XmlEventKind.Text, text });
    };
    this.parser.oncdata = (text: string) => {
      this.queue.push({ kind: XmlEventKind.Text, text });
    };
    this.parser.onerror = (error: Error) => {
      // Only the first failure matters, the load aborts on it.
      if (this.failure === null) {
        this.failure = new MalformedXmlError(firstLine(error.message), {
          line: this.parser.line + 1,
          column: this.parser.column + 1,
          characterOffset: this.parser.position,
        });
      }
    };
  }

  /** Tokenizes one chunk. Throws {@link MalformedXmlError} on a syntax error. */
  write(chunk: string): void {
    if (this.closed) {
      throw new Error("cannot write to a closed XmlEventSource");
    }
    this.parser.write(chunk);
    this.throwIfFailed();
  }

  /** Flushes the tokenizer and queues the final {@link XmlEventKind.Eof} event. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.parser.close();
    this.throwIfFailed();
    this.queue.push({ kind: XmlEventKind.Eof });
  }

  /** Returns the events queued since the previous call. */
  drain(): XmlEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  private throwIfFailed(): void {
    if (this.failure !== null) {
      this.queue = [];
      throw this.failure;
    }
  }
}

/**
 * Lazily yields the events of an in-memory document. The tokenizer only runs
 * ahead of the consumer by one chunk.
 */
export function* iterateXmlEvents(source: string, options: XmlEventOptions = {}): Generator<XmlEvent, void, undefined> {
  const chunkSize = normaliseChunkSize(options.chunkSize);
  const events = new XmlEventSource();
  for (let offset = 0; offset < source.length; offset += chunkSize) {
    events.write(source.slice(offset, offset + chunkSize));
    yield* events.drain();
  }
  events.close();
  yield* events.drain();
}

/**
 * Yields the events of a byte or text stream such as `fs.createReadStream`.
 * Buffers are decoded as UTF-8, multi-byte sequences split across chunks
 * included.
 */
export async function* streamXmlEvents(
  chunks: AsyncIterable<string | Buffer>,
): AsyncGenerator<XmlEvent, void, undefined> {
  const decoder = new StringDecoder("utf8");
  const events = new XmlEventSource();
  for await (const chunk of chunks) {
    events.write(typeof chunk === "string" ? chunk : decoder.write(chunk));
    yield* events.drain();
  }
  const tail = decoder.end();
  if (tail.length > 0) {
    events.write(tail);
  }
  events.close();
  yield* events.drain();
}

function toAttributes(tag: Tag | QualifiedTag): XmlAttributes {
  const attributes: Record<string, string> = {};
  const entries: Array<[string, string | QualifiedAttribute]> = Object.entries(tag.attributes);
  for (const [name, value] of entries) {
    attributes[name] = typeof value === "string" ? value : value.value;
  }
  return attributes;
}

function normaliseChunkSize(chunkSize: number | undefined): number {
  if (chunkSize === undefined || !Number.isFinite(chunkSize) || chunkSize < 1) {
    return DEFAULT_CHUNK_SIZE;
  }
  return Math.floor(chunkSize);
}

function firstLine(message: string): string {
  return message.split("\n")[0];
}

