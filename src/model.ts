/** Language tag of lexical units and synsets. */
export type Language = "pl" | "en";

/** Human readable labels for {@link Language}. */
const LANGUAGE_LABELS: Readonly<Record<Language, string>> = {
  pl: "Polish",
  en: "English",
};

/** Returns the display label of a language tag ("Polish", "English"). */
export function describeLanguage(language: Language): string {
  return LANGUAGE_LABELS[language];
}

/** Part-of-speech suffix marking entries imported from Princeton WordNet. */
export const PWN_POS_SUFFIX = " pwn";

/**
 * Derives the language of a lexical unit from its part-of-speech tag. The
 * parser stores the result once; views recompute it with this same function.
 */
export function languageFromPos(pos: string): Language {
  return pos.endsWith(PWN_POS_SUFFIX) ? "en" : "pl";
}

export interface LexicalUnit {
  readonly id: number;
  readonly name: string;
  readonly pos: string;
  readonly tagcount: number;
  readonly domain: string;
  readonly desc: string;
  readonly workstate: string;
  readonly source: string;
  readonly variant: number;
  /** Derived from {@link pos} at parse time, never read from the document. */
  readonly language: Language;
}

export interface Synset {
  readonly id: number;
  readonly workstate: string;
  readonly split: number;
  readonly owner: string;
  readonly definition: string;
  readonly desc: string;
  readonly abstract: boolean;
  /** Member lexical unit ids in document order. May reference unknown units. */
  readonly lexicalUnits: readonly number[];
}

export interface RelationTypeTest {
  readonly text: string;
  readonly pos: string;
}

export interface RelationType {
  readonly id: number;
  readonly type: string;
  /** Id of the inverse relation type, 0 when none is declared. */
  readonly reverse: number;
  readonly name: string;
  readonly description: string;
  readonly posstr: string;
  readonly display: string;
  readonly shortcut: string;
  readonly autoreverse: boolean;
  readonly pwn: string;
  readonly tests: readonly RelationTypeTest[];
}

/** Directed edge shared by lexical and synset relations. */
export interface RelationEdge {
  readonly parent: number;
  readonly child: number;
  /** Id of the {@link RelationType} describing the edge. */
  readonly relation: number;
  readonly valid: boolean;
  readonly owner: string;
}

export type LexicalRelation = RelationEdge;
export type SynsetRelation = RelationEdge;

export interface GraphMetadata {
  readonly owner: string;
  readonly date: string;
  readonly version: string;
}

/** Collections handed to {@link LexicalGraph} once parsing completed. */
export interface LexicalGraphContents {
  readonly lexicalUnits: Map<number, LexicalUnit>;
  readonly synsets: Map<number, Synset>;
  readonly relationTypes: Map<number, RelationType>;
  readonly lexicalRelations: LexicalRelation[];
  readonly synsetRelations: SynsetRelation[];
}

/**
 * Read-only aggregate produced by one parse. Maps iterate in insertion order,
 * i.e. the order in which ids first appeared in the document. Entities and
 * edge lists are frozen on construction so no caller can mutate the graph
 * after the load returned.
 */
export class LexicalGraph {
  readonly owner: string;
  readonly date: string;
  readonly version: string;
  readonly lexicalUnits: ReadonlyMap<number, LexicalUnit>;
  readonly synsets: ReadonlyMap<number, Synset>;
  readonly relationTypes: ReadonlyMap<number, RelationType>;
  readonly lexicalRelations: readonly LexicalRelation[];
  readonly synsetRelations: readonly SynsetRelation[];

  constructor(metadata: GraphMetadata, contents: LexicalGraphContents) {
    this.owner = metadata.owner;
    this.date = metadata.date;
    this.version = metadata.version;
    this.lexicalUnits = freezeValues(contents.lexicalUnits);
    this.synsets = freezeValues(contents.synsets, (synset) => Object.freeze(synset.lexicalUnits));
    this.relationTypes = freezeValues(contents.relationTypes, (relationType) => {
      relationType.tests.forEach((test) => Object.freeze(test));
      Object.freeze(relationType.tests);
    });
    this.lexicalRelations = freezeList(contents.lexicalRelations);
    this.synsetRelations = freezeList(contents.synsetRelations);
    Object.freeze(this);
  }

  getLexicalUnit(id: number): LexicalUnit | undefined {
    return this.lexicalUnits.get(id);
  }

  getSynset(id: number): Synset | undefined {
    return this.synsets.get(id);
  }

  getRelationType(id: number): RelationType | undefined {
    return this.relationTypes.get(id);
  }
}

/**
 * Freezes every value and returns a private copy of the map, so later writes
 * to the caller's map do not reach the graph.
 */
function freezeValues<V extends object>(map: Map<number, V>, freezeNested?: (value: V) => void): ReadonlyMap<number, V> {
  for (const value of map.values()) {
    freezeNested?.(value);
    Object.freeze(value);
  }
  return new Map(map);
}

function freezeList<T extends object>(list: readonly T[]): readonly T[] {
  for (const item of list) {
    Object.freeze(item);
  }
  return Object.freeze([...list]);
}
