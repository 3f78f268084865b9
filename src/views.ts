import {
  languageFromPos,
  type Language,
  type LexicalGraph,
  type LexicalUnit,
  type RelationEdge,
  type RelationType,
  type Synset,
} from "./model.js";

/**
 * Projections of stored entities. Views are rebuilt on every call and share
 * the graph's strings rather than copying them; nothing here writes back to
 * the graph.
 */
export interface LexicalUnitView {
  readonly id: number;
  readonly name: string;
  readonly pos: string;
  readonly tagcount: number;
  readonly domain: string;
  readonly desc: string;
  readonly workstate: string;
  readonly source: string;
  readonly variant: number;
  readonly language: Language;
}

export interface SynsetView {
  readonly id: number;
  readonly workstate: string;
  readonly split: number;
  readonly owner: string;
  readonly definition: string;
  readonly desc: string;
  readonly abstract: boolean;
  /** Resolved members; ids without a lexical unit are left out. */
  readonly lexicalUnits: readonly LexicalUnitView[];
  /** Language of the first resolved member, Polish when there is none. */
  readonly language: Language;
}

/** Relation type fields without the `tests` list. */
export interface RelationTypeView {
  readonly id: number;
  readonly type: string;
  readonly reverse: number;
  readonly name: string;
  readonly description: string;
  readonly posstr: string;
  readonly display: string;
  readonly shortcut: string;
  readonly autoreverse: boolean;
  readonly pwn: string;
}

/** Edge whose endpoints and type are resolved, `null` where an id is unknown. */
export interface RelationView<T> {
  readonly parent: T | null;
  readonly child: T | null;
  readonly relation: RelationTypeView | null;
  readonly valid: boolean;
  readonly owner: string;
}

export type LexicalRelationView = RelationView<LexicalUnitView>;
export type SynsetRelationView = RelationView<SynsetView>;

export function toLexicalUnitView(unit: LexicalUnit): LexicalUnitView {
  return {
    id: unit.id,
    name: unit.name,
    pos: unit.pos,
    tagcount: unit.tagcount,
    domain: unit.domain,
    desc: unit.desc,
    workstate: unit.workstate,
    source: unit.source,
    variant: unit.variant,
    language: languageFromPos(unit.pos),
  };
}

export function toSynsetView(graph: LexicalGraph, synset: Synset): SynsetView {
  const lexicalUnits: LexicalUnitView[] = [];
  for (const lexicalUnitId of synset.lexicalUnits) {
    const unit = graph.getLexicalUnit(lexicalUnitId);
    if (unit) {
      lexicalUnits.push(toLexicalUnitView(unit));
    }
  }
  return {
    id: synset.id,
    workstate: synset.workstate,
    split: synset.split,
    owner: synset.owner,
    definition: synset.definition,
    desc: synset.desc,
    abstract: synset.abstract,
    lexicalUnits,
    language: lexicalUnits[0]?.language ?? "pl",
  };
}

export function toRelationTypeView(relationType: RelationType): RelationTypeView {
  return {
    id: relationType.id,
    type: relationType.type,
    reverse: relationType.reverse,
    name: relationType.name,
    description: relationType.description,
    posstr: relationType.posstr,
    display: relationType.display,
    shortcut: relationType.shortcut,
    autoreverse: relationType.autoreverse,
    pwn: relationType.pwn,
  };
}

export function toLexicalRelationView(graph: LexicalGraph, edge: RelationEdge): LexicalRelationView {
  return toRelationView(graph, edge, (id) => {
    const unit = graph.getLexicalUnit(id);
    return unit ? toLexicalUnitView(unit) : null;
  });
}

export function toSynsetRelationView(graph: LexicalGraph, edge: RelationEdge): SynsetRelationView {
  return toRelationView(graph, edge, (id) => {
    const synset = graph.getSynset(id);
    return synset ? toSynsetView(graph, synset) : null;
  });
}

function toRelationView<T>(graph: LexicalGraph, edge: RelationEdge, resolve: (id: number) => T | null): RelationView<T> {
  const relationType = graph.getRelationType(edge.relation);
  return {
    parent: resolve(edge.parent),
    child: resolve(edge.child),
    relation: relationType ? toRelationTypeView(relationType) : null,
    valid: edge.valid,
    owner: edge.owner,
  };
}
