import { describe, it } from "mocha";
import { expect } from "chai";
import { Buffer } from "node:buffer";

import { MalformedXmlError, WORDNET_ERROR_CODES } from "../src/errors.js";
import { iterateXmlEvents, streamXmlEvents, XmlEventKind, type XmlEvent } from "../src/events.js";
import { captureError } from "./helpers/assertions.js";

async function collect(events: AsyncIterable<XmlEvent>): Promise<XmlEvent[]> {
  const collected: XmlEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

async function* chunks(...parts: Buffer[]): AsyncGenerator<Buffer> {
  for (const part of parts) {
    yield part;
  }
}

describe("xml event source", () => {
  it("folds self-closing elements into a single empty event", () => {
    const events = [...iterateXmlEvents('<a><b x="1"/>t</a>')];

    expect(events).to.deep.equal([
      { kind: XmlEventKind.Start, element: { tag: "a", attributes: {} } },
      { kind: XmlEventKind.Empty, element: { tag: "b", attributes: { x: "1" } } },
      { kind: XmlEventKind.Text, text: "t" },
      { kind: XmlEventKind.End, tag: "a" },
      { kind: XmlEventKind.Eof },
    ]);
  });

  it("keeps attribute names case-sensitive and decodes entities", () => {
    const events = [...iterateXmlEvents('<root Name="Tom &amp; Jerry" name="x"/>')];

    expect(events[0]).to.deep.equal({
      kind: XmlEventKind.Empty,
      element: { tag: "root", attributes: { Name: "Tom & Jerry", name: "x" } },
    });
  });

  it("produces the same events whatever the chunk size", () => {
    const source = '<a owner="o"><b id="12"/><c>1 2</c></a>';
    const whole = [...iterateXmlEvents(source)];
    const tiny = [...iterateXmlEvents(source, { chunkSize: 3 })];

    const texts = (events: XmlEvent[]) =>
      events.flatMap((event) => (event.kind === XmlEventKind.Text ? [event.text] : []));
    const withoutText = (events: XmlEvent[]) => events.filter((event) => event.kind !== XmlEventKind.Text);

    expect(withoutText(tiny)).to.deep.equal(withoutText(whole));
    expect(texts(tiny).join("")).to.equal("1 2");
  });

  it("reports syntax errors as MalformedXmlError", () => {
    const malformed = captureError(MalformedXmlError, () => [...iterateXmlEvents("<a><b></a>")]);

    expect(malformed.code).to.equal(WORDNET_ERROR_CODES.MALFORMED_XML);
    expect(malformed.position.line).to.equal(1);
    expect(malformed.position.characterOffset).to.be.a("number");
    expect(malformed.details).to.have.property("characterOffset", malformed.position.characterOffset);
  });

  it("decodes utf-8 sequences split across stream chunks", async () => {
    const bytes = Buffer.from('<a name="żółw"/>', "utf8");
    // The first byte of "ż" lands in the first chunk, the second in the next.
    const split = bytes.indexOf(0xc5) + 1;

    const events = await collect(streamXmlEvents(chunks(bytes.subarray(0, split), bytes.subarray(split))));

    expect(events).to.deep.equal([
      { kind: XmlEventKind.Empty, element: { tag: "a", attributes: { name: "żółw" } } },
      { kind: XmlEventKind.Eof },
    ]);
  });
});
