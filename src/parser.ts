import {
  bindAttributes,
  LEXICAL_UNIT_FIELDS,
  parseUnsignedId,
  RELATION_FIELDS,
  RELATION_TYPE_FIELDS,
  RELATION_TYPE_TEST_FIELDS,
  ROOT_FIELDS,
  SYNSET_FIELDS,
} from "./binder.js";
import {
  InvalidAttributeValueError,
  MissingRootError,
  TruncatedDocumentError,
  UnexpectedElementError,
} from "./errors.js";
import { XmlEventKind, type XmlElement, type XmlEvent } from "./events.js";
import {
  languageFromPos,
  LexicalGraph,
  type GraphMetadata,
  type LexicalRelation,
  type LexicalUnit,
  type RelationType,
  type RelationTypeTest,
  type Synset,
  type SynsetRelation,
} from "./model.js";

/** Element names of the plWordNet export, matched exactly. */
export const TAGS = {
  ROOT: "array-list",
  LEXICAL_UNIT: "lexical-unit",
  SYNSET: "synset",
  RELATION_TYPE: "relationtypes",
  RELATION_TYPE_TEST: "test",
  LEXICAL_RELATION: "lexicalrelations",
  SYNSET_RELATION: "synsetrelations",
  UNIT_ID: "unit-id",
} as const;

const KNOWN_TAGS: ReadonlySet<string> = new Set(Object.values(TAGS));

/**
 * Container currently receiving nested content. Synsets and relation types
 * never nest inside each other, so a single slot is enough.
 */
export type ParsingContext =
  | { readonly kind: "idle" }
  | { readonly kind: "synset"; readonly id: number }
  | { readonly kind: "relationType"; readonly id: number };

export const IDLE: ParsingContext = Object.freeze({ kind: "idle" });

interface SynsetDraft extends Omit<Synset, "lexicalUnits"> {
  readonly lexicalUnits: number[];
}

interface RelationTypeDraft extends Omit<RelationType, "tests"> {
  readonly tests: RelationTypeTest[];
}

/**
 * Mutable accumulator filled by {@link transition}. It only lives for the
 * duration of one parse; {@link build} hands its collections to an immutable
 * {@link LexicalGraph} and every later addition throws.
 */
export class GraphBuilder {
  private metadata: GraphMetadata | null = null;
  private built = false;
  private readonly lexicalUnits = new Map<number, LexicalUnit>();
  private readonly synsets = new Map<number, SynsetDraft>();
  private readonly relationTypes = new Map<number, RelationTypeDraft>();
  private readonly lexicalRelations: LexicalRelation[] = [];
  private readonly synsetRelations: SynsetRelation[] = [];

  get hasRoot(): boolean {
    return this.metadata !== null;
  }

  openRoot(metadata: GraphMetadata): void {
    this.assertOpen();
    this.metadata = metadata;
  }

  addLexicalUnit(unit: LexicalUnit): void {
    this.assertOpen();
    this.lexicalUnits.set(unit.id, unit);
  }

  addSynset(synset: SynsetDraft): void {
    this.assertOpen();
    this.synsets.set(synset.id, synset);
  }

  addSynsetMember(synsetId: number, lexicalUnitId: number): void {
    this.assertOpen();
    this.synsets.get(synsetId)?.lexicalUnits.push(lexicalUnitId);
  }

  addRelationType(relationType: RelationTypeDraft): void {
    this.assertOpen();
    this.relationTypes.set(relationType.id, relationType);
  }

  addRelationTypeTest(relationTypeId: number, test: RelationTypeTest): void {
    this.assertOpen();
    this.relationTypes.get(relationTypeId)?.tests.push(test);
  }

  addLexicalRelation(relation: LexicalRelation): void {
    this.assertOpen();
    this.lexicalRelations.push(relation);
  }

  addSynsetRelation(relation: SynsetRelation): void {
    this.assertOpen();
    this.synsetRelations.push(relation);
  }

  build(): LexicalGraph {
    if (this.metadata === null) {
      throw new MissingRootError(TAGS.ROOT);
    }
    this.built = true;
    return new LexicalGraph(this.metadata, {
      lexicalUnits: this.lexicalUnits,
      synsets: this.synsets,
      relationTypes: this.relationTypes,
      lexicalRelations: this.lexicalRelations,
      synsetRelations: this.synsetRelations,
    });
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("GraphBuilder already built its graph");
    }
  }
}

/**
 * Applies one event: records whatever entity it completes in {@link builder}
 * and returns the context the next event is read in.
 */
export function transition(context: ParsingContext, event: XmlEvent, builder: GraphBuilder): ParsingContext {
  switch (event.kind) {
    case XmlEventKind.Start:
      return openElement(context, event.element, builder);
    case XmlEventKind.Empty:
      return emptyElement(context, event.element, builder);
    case XmlEventKind.Text:
      if (context.kind === "synset") {
        appendMembers(context.id, event.text, builder);
      }
      return context;
    case XmlEventKind.End:
      return closeElement(context, event.tag);
    case XmlEventKind.Eof:
      return context;
  }
}

function openElement(context: ParsingContext, element: XmlElement, builder: GraphBuilder): ParsingContext {
  switch (element.tag) {
    case TAGS.ROOT:
      openRoot(context, element, builder);
      return context;
    case TAGS.SYNSET: {
      requireContainerSlot(context, element.tag, builder);
      const synset = toSynset(element);
      builder.addSynset(synset);
      return { kind: "synset", id: synset.id };
    }
    case TAGS.RELATION_TYPE: {
      requireContainerSlot(context, element.tag, builder);
      const relationType = toRelationType(element);
      builder.addRelationType(relationType);
      return { kind: "relationType", id: relationType.id };
    }
    case TAGS.UNIT_ID:
      requireRoot(element.tag, builder);
      return context;
    default:
      throw new UnexpectedElementError(element.tag, describeContext(context));
  }
}

function emptyElement(context: ParsingContext, element: XmlElement, builder: GraphBuilder): ParsingContext {
  switch (element.tag) {
    case TAGS.ROOT:
      openRoot(context, element, builder);
      return context;
    case TAGS.LEXICAL_UNIT:
      requireRoot(element.tag, builder);
      builder.addLexicalUnit(toLexicalUnit(element));
      return context;
    case TAGS.SYNSET:
      requireContainerSlot(context, element.tag, builder);
      builder.addSynset(toSynset(element));
      return context;
    case TAGS.RELATION_TYPE:
      requireContainerSlot(context, element.tag, builder);
      builder.addRelationType(toRelationType(element));
      return context;
    case TAGS.RELATION_TYPE_TEST:
      requireRoot(element.tag, builder);
      if (context.kind !== "relationType") {
        throw new UnexpectedElementError(element.tag, describeContext(context));
      }
      builder.addRelationTypeTest(context.id, bindAttributes(element, RELATION_TYPE_TEST_FIELDS));
      return context;
    case TAGS.LEXICAL_RELATION:
      requireRoot(element.tag, builder);
      builder.addLexicalRelation(bindAttributes(element, RELATION_FIELDS));
      return context;
    case TAGS.SYNSET_RELATION:
      requireRoot(element.tag, builder);
      builder.addSynsetRelation(bindAttributes(element, RELATION_FIELDS));
      return context;
    case TAGS.UNIT_ID:
      requireRoot(element.tag, builder);
      return context;
    default:
      throw new UnexpectedElementError(element.tag, describeContext(context));
  }
}

function closeElement(context: ParsingContext, tag: string): ParsingContext {
  if (tag === TAGS.SYNSET || tag === TAGS.RELATION_TYPE) {
    return IDLE;
  }
  if (!KNOWN_TAGS.has(tag)) {
    throw new UnexpectedElementError(tag, describeContext(context));
  }
  return context;
}

function openRoot(context: ParsingContext, element: XmlElement, builder: GraphBuilder): void {
  if (builder.hasRoot) {
    throw new UnexpectedElementError(element.tag, describeContext(context));
  }
  builder.openRoot(bindAttributes(element, ROOT_FIELDS));
}

function appendMembers(synsetId: number, text: string, builder: GraphBuilder): void {
  for (const token of text.split(/\s+/)) {
    if (token.length === 0) {
      continue;
    }
    const lexicalUnitId = parseUnsignedId(token);
    if (lexicalUnitId === undefined) {
      throw new InvalidAttributeValueError(TAGS.SYNSET, TAGS.UNIT_ID, token);
    }
    builder.addSynsetMember(synsetId, lexicalUnitId);
  }
}

function requireRoot(tag: string, builder: GraphBuilder): void {
  if (!builder.hasRoot) {
    throw new MissingRootError(TAGS.ROOT, tag);
  }
}

/** Containers may only open while no other container is open. */
function requireContainerSlot(context: ParsingContext, tag: string, builder: GraphBuilder): void {
  requireRoot(tag, builder);
  if (context.kind !== "idle") {
    throw new UnexpectedElementError(tag, describeContext(context));
  }
}

function describeContext(context: ParsingContext): string {
  return context.kind === "idle" ? "idle" : `${context.kind}#${context.id}`;
}

function toLexicalUnit(element: XmlElement): LexicalUnit {
  const fields = bindAttributes(element, LEXICAL_UNIT_FIELDS);
  return { ...fields, language: languageFromPos(fields.pos) };
}

function toSynset(element: XmlElement): SynsetDraft {
  return { ...bindAttributes(element, SYNSET_FIELDS), lexicalUnits: [] };
}

function toRelationType(element: XmlElement): RelationTypeDraft {
  return { ...bindAttributes(element, RELATION_TYPE_FIELDS), tests: [] };
}

/**
 * Incremental driver around {@link transition}. Feed it every event of one
 * document, then call {@link finish}; the parser is single use.
 */
export class WordNetParser {
  private context: ParsingContext = IDLE;
  private readonly builder = new GraphBuilder();
  private elements = 0;
  private sawEof = false;
  private finished = false;

  /** Number of start and self-closing elements consumed so far. */
  get elementCount(): number {
    return this.elements;
  }

  get currentContext(): ParsingContext {
    return this.context;
  }

  consume(event: XmlEvent): void {
    if (this.sawEof || this.finished) {
      throw new Error("WordNetParser already reached the end of its document");
    }
    if (event.kind === XmlEventKind.Start || event.kind === XmlEventKind.Empty) {
      this.elements += 1;
    } else if (event.kind === XmlEventKind.Eof) {
      this.sawEof = true;
    }
    this.context = transition(this.context, event, this.builder);
  }

  /**
   * Returns the graph. Throws {@link TruncatedDocumentError} unless the end of
   * input was consumed with no container open, and {@link MissingRootError}
   * when no root was seen.
   */
  finish(): LexicalGraph {
    this.finished = true;
    if (!this.sawEof || this.context.kind !== "idle") {
      throw new TruncatedDocumentError(describeContext(this.context));
    }
    return this.builder.build();
  }
}

/** Builds a graph from a complete, synchronous event sequence. */
export function parseEvents(events: Iterable<XmlEvent>): LexicalGraph {
  const parser = new WordNetParser();
  for (const event of events) {
    parser.consume(event);
  }
  return parser.finish();
}
