import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { __testing } from "../src/cli.js";
import { InvalidArgumentError } from "../src/errors.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";

const { parseArgs, buildReport, createCliLogger, formatTextReport, isEntryPoint } = __testing;

describe("fabric-topology CLI", () => {
  const originalLevel = process.env.TOPOLOGY_LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.TOPOLOGY_LOG_LEVEL;
    } else {
      process.env.TOPOLOGY_LOG_LEVEL = originalLevel;
    }
  });

  it("parses kinds case-insensitively with sizes and flags", () => {
    expect(parseArgs(["Grid", "3", "1", "5", "--format", "json"])).to.deep.equal({
      topology: "grid",
      sizes: [3, 1, 5],
      format: "json",
      eccentricities: false,
    });
    expect(parseArgs(["umesh", "--eccentricities", "3"])).to.deep.equal({
      topology: "umesh",
      sizes: [3],
      format: "text",
      eccentricities: true,
    });
  });

  it("rejects malformed invocations", () => {
    expect(() => parseArgs(["--format", "json"])).to.throw("First positional argument must be the topology kind");
    expect(() => parseArgs(["hypercube", "3"])).to.throw("Unknown topology 'hypercube'");
    expect(() => parseArgs(["bring", "-2"])).to.throw("Size '-2' is not a non-negative integer");
    expect(() => parseArgs(["bring", "4", "--verbose"])).to.throw("Unknown argument '--verbose'");
    expect(() => parseArgs(["bring", "4", "--format", "yaml"])).to.throw("--format must be 'json' or 'text'");
  });

  it("summarises a canonicalised grid", () => {
    const report = buildReport(parseArgs(["grid", "3", "1", "5"]));
    expect(report).to.deep.equal({ name: "BGrid[5,3]", kind: "BGrid", vertices: 15, edges: 44, diameter: 6 });
  });

  it("checks the number of sizes per kind", () => {
    expect(() => buildReport(parseArgs(["bring"]))).to.throw("bring expects exactly one size");
    expect(() => buildReport(parseArgs(["opg", "2"]))).to.throw("opg takes no size");
    expect(() => buildReport(parseArgs(["uring", "0"]))).to.throw(InvalidArgumentError);
  });

  it("renders text reports with unreachable eccentricities as dashes", () => {
    const report = buildReport(parseArgs(["umesh", "3", "--eccentricities"]));
    expect(formatTextReport(report)).to.deep.equal([
      "Name: UMesh",
      "Kind: UMesh",
      "Vertices: 3",
      "Edges: 2",
      "Diameter: 2",
      "Eccentricities: 2, -, -",
    ]);
  });

  it("routes builder logs through the logger it is given", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "debug", silent: true, onEntry: (entry) => entries.push(entry) });
    buildReport(parseArgs(["grid", "2", "2", "--format", "json"]), logger);
    expect(entries.map((entry) => entry.message)).to.deep.equal(["graph_product_built", "topology_composed"]);
  });

  it("keeps log lines off stdout for JSON reports", () => {
    process.env.TOPOLOGY_LOG_LEVEL = "debug";
    const jsonLogger = createCliLogger("json");
    expect(jsonLogger.silent).to.equal(true);
    expect(jsonLogger.level).to.equal("debug");
    expect(createCliLogger("text").silent).to.equal(false);
  });

  it("recognises the entry point through an installed symlink", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "topology-cli-"));
    try {
      const script = path.join(directory, "cli.js");
      const link = path.join(directory, "fabric-topology");
      await writeFile(script, "", "utf8");
      await symlink(script, link);
      const moduleUrl = pathToFileURL(script).href;

      expect(isEntryPoint(script, moduleUrl)).to.equal(true);
      expect(isEntryPoint(link, moduleUrl)).to.equal(true);
      expect(isEntryPoint(path.join(directory, "missing.js"), moduleUrl)).to.equal(false);
      expect(isEntryPoint(undefined, moduleUrl)).to.equal(false);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
