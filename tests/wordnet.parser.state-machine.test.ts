import { describe, it } from "mocha";
import { expect } from "chai";

import {
  InvalidAttributeValueError,
  MissingRootError,
  TruncatedDocumentError,
  UnexpectedElementError,
  WORDNET_ERROR_CODES,
} from "../src/errors.js";
import { iterateXmlEvents, XmlEventKind } from "../src/events.js";
import { LexicalGraph, type LexicalUnit } from "../src/model.js";
import { GraphBuilder, IDLE, parseEvents, transition, WordNetParser } from "../src/parser.js";
import { captureError } from "./helpers/assertions.js";

function document(body: string): string {
  return `<?xml version="1.0"?>\n<array-list owner="o" date="2024-02-01" version="1.0">${body}</array-list>`;
}

const UNIT: LexicalUnit = {
  id: 9,
  name: "late",
  pos: "rzeczownik",
  tagcount: 0,
  domain: "",
  desc: "",
  workstate: "",
  source: "",
  variant: 0,
  language: "pl",
};

function parse(xml: string): LexicalGraph {
  return parseEvents(iterateXmlEvents(xml));
}

describe("wordnet parser state machine", () => {
  it("reads the root metadata", () => {
    const graph = parse(document(""));

    expect([graph.owner, graph.date, graph.version]).to.deep.equal(["o", "2024-02-01", "1.0"]);
    expect(graph.lexicalUnits.size).to.equal(0);
    expect(graph.synsetRelations).to.deep.equal([]);
  });

  it("derives the language of lexical units from their part of speech", () => {
    const graph = parse(
      document(
        '<lexical-unit id="1" name="kot" pos="rzeczownik"/><lexical-unit id="2" name="cat" pos="noun pwn"/>',
      ),
    );

    expect(graph.getLexicalUnit(1)?.language).to.equal("pl");
    expect(graph.getLexicalUnit(2)?.language).to.equal("en");
  });

  it("collects synset members from whitespace separated text and unit-id wrappers", () => {
    const graph = parse(
      document(
        '<synset id="100">1 2</synset>' +
          '<synset id="101">\n  <unit-id>3</unit-id>\n  <unit-id>3</unit-id>\n  <unit-id>4</unit-id>\n</synset>',
      ),
    );

    expect(graph.getSynset(100)?.lexicalUnits).to.deep.equal([1, 2]);
    expect(graph.getSynset(101)?.lexicalUnits).to.deep.equal([3, 3, 4]);
  });

  it("accepts self-closing synsets without members", () => {
    const graph = parse(document('<synset id="5" definition="empty"/><synset id="6">9</synset>'));

    expect(graph.getSynset(5)?.lexicalUnits).to.deep.equal([]);
    expect(graph.getSynset(5)?.definition).to.equal("empty");
    expect(graph.getSynset(6)?.lexicalUnits).to.deep.equal([9]);
  });

  it("rejects synset member text that is not an id", () => {
    const error = captureError(InvalidAttributeValueError, () => parse(document('<synset id="1">1 x</synset>')));

    expect([error.tag, error.field, error.rawValue]).to.deep.equal(["synset", "unit-id", "x"]);
  });

  it("attaches tests to the open relation type and defaults reverse to zero", () => {
    const graph = parse(
      document(
        '<relationtypes id="10" name="hiponimia" reverse="11">' +
          '<test text="X to Y" pos="rzeczownik"/><test text="X jest Y" pos="czasownik"/>' +
          "</relationtypes>" +
          '<relationtypes id="11" name="hiperonimia"/>',
      ),
    );

    expect(graph.getRelationType(10)?.tests).to.deep.equal([
      { text: "X to Y", pos: "rzeczownik" },
      { text: "X jest Y", pos: "czasownik" },
    ]);
    expect(graph.getRelationType(10)?.reverse).to.equal(11);
    expect(graph.getRelationType(11)?.reverse).to.equal(0);
    expect(graph.getRelationType(11)?.tests).to.deep.equal([]);
  });

  it("keeps relation edges in document order including duplicates and dangling ids", () => {
    const graph = parse(
      document(
        '<synsetrelations parent="1" child="2" relation="3" valid="true"/>' +
          '<synsetrelations parent="1" child="2" relation="3" valid="true"/>' +
          '<lexicalrelations parent="7" child="999" relation="5" owner="anna"/>',
      ),
    );

    expect(graph.synsetRelations).to.deep.equal([
      { parent: 1, child: 2, relation: 3, valid: true, owner: "" },
      { parent: 1, child: 2, relation: 3, valid: true, owner: "" },
    ]);
    expect(graph.lexicalRelations).to.deep.equal([{ parent: 7, child: 999, relation: 5, valid: false, owner: "anna" }]);
  });

  it("lets a repeated id replace the earlier entity", () => {
    const graph = parse(
      document(
        '<lexical-unit id="1" name="first"/><lexical-unit id="2" name="other"/><lexical-unit id="1" name="second"/>',
      ),
    );

    expect(graph.lexicalUnits.size).to.equal(2);
    expect(graph.getLexicalUnit(1)?.name).to.equal("second");
    expect([...graph.lexicalUnits.keys()]).to.deep.equal([1, 2]);
  });

  it("rejects a test element outside a relation type", () => {
    const error = captureError(UnexpectedElementError, () => parse(document('<test text="X" pos="Y"/>')));

    expect(error.tag).to.equal("test");
    expect(error.context).to.equal("idle");
  });

  it("rejects a container opened inside another container", () => {
    const error = captureError(UnexpectedElementError, () =>
      parse(document('<synset id="1"><synset id="2"></synset></synset>')),
    );

    expect(error.tag).to.equal("synset");
    expect(error.context).to.equal("synset#1");
    expect(error.message).to.equal("unexpected element <synset> (context: synset#1)");
  });

  it("rejects unknown elements and a second root", () => {
    expect(captureError(UnexpectedElementError, () => parse(document("<foo/>"))).tag).to.equal("foo");
    expect(captureError(UnexpectedElementError, () => parse(document("<array-list/>"))).tag).to.equal("array-list");
  });

  it("reports entities that appear before the root", () => {
    const error = captureError(MissingRootError, () => parse('<lexical-unit id="1"/>'));

    expect(error.offendingTag).to.equal("lexical-unit");
    expect(error.message).to.equal("<lexical-unit> appeared before the <array-list> root");
  });

  it("reports a document that never opened the root", () => {
    const error = captureError(MissingRootError, () => parseEvents([{ kind: XmlEventKind.Eof }]));

    expect(error.offendingTag).to.equal(null);
    expect(error.message).to.equal("document ended without a <array-list> root");
  });

  it("freezes the graph and everything it holds", () => {
    const graph = parse(document('<synset id="1">2</synset><synsetrelations parent="1" child="1" relation="1"/>'));

    expect(Object.isFrozen(graph)).to.equal(true);
    expect(Object.isFrozen(graph.getSynset(1))).to.equal(true);
    expect(Object.isFrozen(graph.getSynset(1)?.lexicalUnits)).to.equal(true);
    expect(Object.isFrozen(graph.synsetRelations)).to.equal(true);
    expect(Object.isFrozen(graph.synsetRelations[0])).to.equal(true);
  });

  it("transitions into and out of a synset context", () => {
    const builder = new GraphBuilder();
    builder.openRoot({ owner: "", date: "", version: "" });

    const opened = transition(
      IDLE,
      { kind: XmlEventKind.Start, element: { tag: "synset", attributes: { id: "5" } } },
      builder,
    );
    expect(opened).to.deep.equal({ kind: "synset", id: 5 });

    const afterText = transition(opened, { kind: XmlEventKind.Text, text: " 8 " }, builder);
    expect(afterText).to.equal(opened);

    const closed = transition(afterText, { kind: XmlEventKind.End, tag: "synset" }, builder);
    expect(closed).to.equal(IDLE);
    expect(builder.build().getSynset(5)?.lexicalUnits).to.deep.equal([8]);
  });

  it("counts elements and refuses events after the end of the document", () => {
    const parser = new WordNetParser();
    for (const event of iterateXmlEvents(document('<synset id="1"><unit-id>2</unit-id></synset>'))) {
      parser.consume(event);
    }

    expect(parser.elementCount).to.equal(3);
    expect(parser.currentContext).to.equal(IDLE);
    expect(() => parser.consume({ kind: XmlEventKind.Eof })).to.throw(
      "WordNetParser already reached the end of its document",
    );
    expect(parser.finish().getSynset(1)?.lexicalUnits).to.deep.equal([2]);
  });

  it("refuses additions once the builder produced its graph", () => {
    const builder = new GraphBuilder();
    builder.openRoot({ owner: "", date: "", version: "" });
    builder.addSynset({
      id: 1,
      workstate: "",
      split: 0,
      owner: "",
      definition: "",
      desc: "",
      abstract: false,
      lexicalUnits: [],
    });
    const graph = builder.build();

    expect(() => builder.addLexicalUnit(UNIT)).to.throw("GraphBuilder already built its graph");
    expect(() => builder.addSynsetMember(1, 9)).to.throw("GraphBuilder already built its graph");
    expect(graph.lexicalUnits.size).to.equal(0);
    expect(graph.getSynset(1)?.lexicalUnits).to.deep.equal([]);
  });

  it("copies the collections it is built from", () => {
    const lexicalUnits = new Map<number, LexicalUnit>();
    const synsetRelations = [{ parent: 1, child: 2, relation: 3, valid: true, owner: "" }];
    const graph = new LexicalGraph(
      { owner: "", date: "", version: "" },
      { lexicalUnits, synsets: new Map(), relationTypes: new Map(), lexicalRelations: [], synsetRelations },
    );

    lexicalUnits.set(UNIT.id, UNIT);
    synsetRelations.push({ parent: 4, child: 5, relation: 6, valid: false, owner: "" });

    expect(graph.lexicalUnits.size).to.equal(0);
    expect(graph.synsetRelations).to.have.length(1);
  });

  it("refuses to finish a sequence that never reached the end of input", () => {
    const parser = new WordNetParser();
    parser.consume({ kind: XmlEventKind.Start, element: { tag: "array-list", attributes: {} } });
    parser.consume({ kind: XmlEventKind.Start, element: { tag: "synset", attributes: { id: "1" } } });
    parser.consume({ kind: XmlEventKind.Text, text: "5" });

    const error = captureError(TruncatedDocumentError, () => parser.finish());

    expect(error.code).to.equal(WORDNET_ERROR_CODES.TRUNCATED);
    expect(error.context).to.equal("synset#1");
    expect(error.message).to.equal("document ended prematurely (context: synset#1)");
  });

  it("refuses to finish while a container is still open", () => {
    const error = captureError(TruncatedDocumentError, () =>
      parseEvents([
        { kind: XmlEventKind.Start, element: { tag: "array-list", attributes: {} } },
        { kind: XmlEventKind.Start, element: { tag: "relationtypes", attributes: { id: "4" } } },
        { kind: XmlEventKind.Eof },
      ]),
    );

    expect(error.context).to.equal("relationType#4");
  });

  it("refuses to finish an idle sequence without the end of input", () => {
    const error = captureError(TruncatedDocumentError, () =>
      parseEvents([{ kind: XmlEventKind.Empty, element: { tag: "array-list", attributes: {} } }]),
    );

    expect(error.context).to.equal("idle");
  });
});
