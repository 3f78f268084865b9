import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

const FIXED_NOW = () => new Date("2024-01-01T00:00:00.000Z");

function collectingSink(): { lines: string[]; write(chunk: string): boolean } {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string) {
      lines.push(chunk);
      return true;
    },
  };
}

describe("structured logger", () => {
  const directories: string[] = [];

  afterEach(async () => {
    await Promise.all(directories.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("writes one JSON line per entry", () => {
    const sink = collectingSink();
    const logger = new StructuredLogger({ sink, now: FIXED_NOW });

    logger.info("hello", { a: 1 });
    logger.warn("bare");

    expect(sink.lines).to.deep.equal([
      '{"timestamp":"2024-01-01T00:00:00.000Z","level":"info","message":"hello","payload":{"a":1}}\n',
      '{"timestamp":"2024-01-01T00:00:00.000Z","level":"warn","message":"bare"}\n',
    ]);
  });

  it("drops entries below the configured level", () => {
    const sink = collectingSink();
    const logger = new StructuredLogger({ sink, level: "warn" });

    logger.debug("d");
    logger.info("i");
    logger.error("e");

    expect(sink.lines).to.have.length(1);
    expect(logger.isEnabled("info")).to.equal(false);
    expect(logger.isEnabled("error")).to.equal(true);
  });

  it("notifies the entry listener with a copy of the entry", () => {
    const received: LogEntry[] = [];
    const payload = { count: 1 };
    const logger = new StructuredLogger({ sink: collectingSink(), now: FIXED_NOW, onEntry: (entry) => received.push(entry) });

    logger.error("boom", payload);
    payload.count = 2;

    expect(received).to.deep.equal([
      { timestamp: "2024-01-01T00:00:00.000Z", level: "error", message: "boom", payload: { count: 1 } },
    ]);
  });

  it("mirrors entries to a log file, creating its directory", async () => {
    const dir = await mkdtemp(join(tmpdir(), "plwn-logger-"));
    directories.push(dir);
    const logFile = join(dir, "nested", "load.log");
    const logger = new StructuredLogger({ sink: collectingSink(), now: FIXED_NOW, logFile });

    logger.info("first");
    logger.info("second");
    await logger.flush();

    expect(await readFile(logFile, "utf8")).to.equal(
      '{"timestamp":"2024-01-01T00:00:00.000Z","level":"info","message":"first"}\n' +
        '{"timestamp":"2024-01-01T00:00:00.000Z","level":"info","message":"second"}\n',
    );
  });
});
