import type { Language, LexicalGraph, LexicalRelation, LexicalUnit, Synset, SynsetRelation } from "./model.js";
import {
  toLexicalRelationView,
  toLexicalUnitView,
  toRelationTypeView,
  toSynsetRelationView,
  toSynsetView,
  type LexicalRelationView,
  type LexicalUnitView,
  type RelationTypeView,
  type SynsetRelationView,
  type SynsetView,
} from "./views.js";

/** Summary of a loaded graph: document metadata plus collection sizes. */
export interface GraphSummary {
  readonly owner: string;
  readonly date: string;
  readonly version: string;
  readonly lexicalUnits: number;
  readonly synsets: number;
  readonly relationTypes: number;
  readonly lexicalRelations: number;
  readonly synsetRelations: number;
}

/**
 * Wraps a generator factory so that every `for...of` starts a fresh pass.
 * Plain generators are single use; the sequences returned by
 * {@link WordNetQuery} can be iterated any number of times.
 */
function restartable<T>(factory: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

/**
 * Read accessors over a loaded {@link LexicalGraph}. Every method is a pure
 * function of the graph: views are built per call and nothing is cached.
 */
export class WordNetQuery {
  constructor(readonly graph: LexicalGraph) {}

  getLexicalUnit(id: number): LexicalUnitView | undefined {
    const unit = this.graph.getLexicalUnit(id);
    return unit ? toLexicalUnitView(unit) : undefined;
  }

  getSynset(id: number): SynsetView | undefined {
    const synset = this.graph.getSynset(id);
    return synset ? toSynsetView(this.graph, synset) : undefined;
  }

  getRelationType(id: number): RelationTypeView | undefined {
    const relationType = this.graph.getRelationType(id);
    return relationType ? toRelationTypeView(relationType) : undefined;
  }

  lexicalUnits(): Iterable<LexicalUnitView> {
    const { graph } = this;
    return restartable(function* () {
      for (const unit of graph.lexicalUnits.values()) {
        yield toLexicalUnitView(unit);
      }
    });
  }

  synsets(): Iterable<SynsetView> {
    const { graph } = this;
    return restartable(function* () {
      for (const synset of graph.synsets.values()) {
        yield toSynsetView(graph, synset);
      }
    });
  }

  relationTypes(): Iterable<RelationTypeView> {
    const { graph } = this;
    return restartable(function* () {
      for (const relationType of graph.relationTypes.values()) {
        yield toRelationTypeView(relationType);
      }
    });
  }

  lexicalRelations(): Iterable<LexicalRelationView> {
    const { graph } = this;
    return restartable(function* () {
      for (const edge of graph.lexicalRelations) {
        yield toLexicalRelationView(graph, edge);
      }
    });
  }

  synsetRelations(): Iterable<SynsetRelationView> {
    const { graph } = this;
    return restartable(function* () {
      for (const edge of graph.synsetRelations) {
        yield toSynsetRelationView(graph, edge);
      }
    });
  }

  /**
   * Synsets of one language. A synset is Polish when every member that
   * resolves to a lexical unit is Polish, English otherwise; members that do
   * not resolve are ignored. This classification differs from
   * {@link SynsetView.language}, which only looks at the first member.
   */
  synsetsByLanguage(language: Language): Iterable<Synset> {
    const { graph } = this;
    const wantPolish = language === "pl";
    return restartable(function* () {
      for (const synset of graph.synsets.values()) {
        if (isPolishSynset(graph, synset) === wantPolish) {
          yield synset;
        }
      }
    });
  }

  synsetRelationsByType(relationTypeId: number): Iterable<SynsetRelation> {
    return filterByRelation(this.graph.synsetRelations, relationTypeId);
  }

  lexicalRelationsByType(relationTypeId: number): Iterable<LexicalRelation> {
    return filterByRelation(this.graph.lexicalRelations, relationTypeId);
  }

  /** Resolved member records of a synset; empty for an unknown synset. */
  lexicalUnitsForSynset(synsetId: number): Iterable<LexicalUnit> {
    const { graph } = this;
    return restartable(function* () {
      yield* resolveMembers(graph, graph.getSynset(synsetId));
    });
  }

  /** Resolved member records of several synsets, in id encounter order. */
  lexicalUnitsForSynsets(synsetIds: Iterable<number>): Iterable<LexicalUnit> {
    const { graph } = this;
    const ids = [...new Set(synsetIds)];
    return restartable(function* () {
      for (const id of ids) {
        yield* resolveMembers(graph, graph.getSynset(id));
      }
    });
  }

  /** Comma-joined names of the resolved members, `""` for an unknown synset. */
  synsetToSimple(synsetId: number): string {
    return Array.from(this.lexicalUnitsForSynset(synsetId), (unit) => unit.name).join(",");
  }

  /**
   * Renders several synsets with {@link synsetToSimple} and joins the
   * non-empty renderings with commas. Repeated ids are rendered once, and
   * unknown or memberless synsets are skipped rather than leaving an empty
   * slot between two commas.
   */
  synsetsToSimple(synsetIds: Iterable<number>): string {
    const parts: string[] = [];
    for (const id of new Set(synsetIds)) {
      const rendering = this.synsetToSimple(id);
      if (rendering.length > 0) {
        parts.push(rendering);
      }
    }
    return parts.join(",");
  }

  getMetadata(): GraphSummary {
    const { graph } = this;
    return {
      owner: graph.owner,
      date: graph.date,
      version: graph.version,
      lexicalUnits: graph.lexicalUnits.size,
      synsets: graph.synsets.size,
      relationTypes: graph.relationTypes.size,
      lexicalRelations: graph.lexicalRelations.length,
      synsetRelations: graph.synsetRelations.length,
    };
  }
}

function isPolishSynset(graph: LexicalGraph, synset: Synset): boolean {
  for (const lexicalUnitId of synset.lexicalUnits) {
    const unit = graph.getLexicalUnit(lexicalUnitId);
    if (unit && unit.language !== "pl") {
      return false;
    }
  }
  return true;
}

function* resolveMembers(graph: LexicalGraph, synset: Synset | undefined): Generator<LexicalUnit, void, undefined> {
  if (!synset) {
    return;
  }
  for (const lexicalUnitId of synset.lexicalUnits) {
    const unit = graph.getLexicalUnit(lexicalUnitId);
    if (unit) {
      yield unit;
    }
  }
}

function filterByRelation<T extends { readonly relation: number }>(
  edges: readonly T[],
  relationTypeId: number,
): Iterable<T> {
  return restartable(function* () {
    for (const edge of edges) {
      if (edge.relation === relationTypeId) {
        yield edge;
      }
    }
  });
}
