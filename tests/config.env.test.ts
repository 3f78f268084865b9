import { describe, it } from "mocha";
import { expect } from "chai";

import { ConfigError, DEFAULT_CHUNK_BYTES, DEFAULT_PROGRESS_INTERVAL, loadConfig } from "../src/config.js";
import { captureError } from "./helpers/assertions.js";

describe("environment configuration", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(loadConfig({})).to.deep.equal({
      sourcePath: null,
      logLevel: "info",
      logFile: null,
      chunkBytes: DEFAULT_CHUNK_BYTES,
      progressInterval: DEFAULT_PROGRESS_INTERVAL,
    });
  });

  it("reads and normalises every variable", () => {
    const config = loadConfig({
      PLWN_SOURCE: " /data/plwordnet.xml ",
      PLWN_LOG_LEVEL: "DEBUG",
      PLWN_LOG_FILE: "/tmp/plwn/load.log",
      PLWN_CHUNK_BYTES: "2048",
      PLWN_PROGRESS_INTERVAL: "0",
    });

    expect(config).to.deep.equal({
      sourcePath: "/data/plwordnet.xml",
      logLevel: "debug",
      logFile: "/tmp/plwn/load.log",
      chunkBytes: 2048,
      progressInterval: 0,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ PLWN_SOURCE: "   ", PLWN_LOG_LEVEL: "", PLWN_CHUNK_BYTES: " " });

    expect(config.sourcePath).to.equal(null);
    expect(config.logLevel).to.equal("info");
    expect(config.chunkBytes).to.equal(DEFAULT_CHUNK_BYTES);
  });

  it("explains a non-numeric integer variable", () => {
    const error = captureError(ConfigError, () => loadConfig({ PLWN_PROGRESS_INTERVAL: "abc" }));

    expect(error.issues).to.deep.equal(["PLWN_PROGRESS_INTERVAL: expected a non-negative integer"]);
    expect(error.message).to.equal("invalid configuration: PLWN_PROGRESS_INTERVAL: expected a non-negative integer");
  });

  it("names every offending variable", () => {
    const error = captureError(ConfigError, () =>
      loadConfig({ PLWN_LOG_LEVEL: "verbose", PLWN_CHUNK_BYTES: "10" }),
    );

    expect(error.issues.map((issue) => issue.split(":")[0])).to.have.members(["PLWN_LOG_LEVEL", "PLWN_CHUNK_BYTES"]);
  });
});
