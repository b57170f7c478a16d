/**
 * Table-driven tests covering the environment parsing helpers and the
 * `TOPOLOGY_*` configuration built on top of them.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { readEnum, readOptionalEnum, readOptionalString } from "../../src/config/env.js";
import { loadTopologyConfig } from "../../src/config/topology.js";

const trackedKeys = [
  "TEST_ENUM",
  "TEST_STRING",
  "TOPOLOGY_LOG_LEVEL",
  "TOPOLOGY_LOG_FILE",
  "TOPOLOGY_MUTATION_MODE",
] as const;

type TrackedKey = (typeof trackedKeys)[number];

/** Stores the original environment variables so each test can restore them. */
const originalEnv = new Map<TrackedKey, string | undefined>();

function setEnv(name: TrackedKey, value: string | undefined): void {
  if (!originalEnv.has(name)) {
    originalEnv.set(name, process.env[name]);
  }

  if (typeof value === "string") {
    process.env[name] = value;
  } else {
    delete process.env[name];
  }
}

describe("config/env helpers", () => {
  afterEach(() => {
    for (const [key, value] of originalEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    originalEnv.clear();
  });

  it("matches enum literals case-insensitively", () => {
    setEnv("TEST_ENUM", "  FrEeZe ");
    expect(readOptionalEnum("TEST_ENUM", ["degrade", "freeze"])).to.equal("freeze");
  });

  it("falls back to the default for unknown or blank enum values", () => {
    setEnv("TEST_ENUM", "sometimes");
    expect(readOptionalEnum("TEST_ENUM", ["degrade", "freeze"])).to.equal(undefined);
    expect(readEnum("TEST_ENUM", ["degrade", "freeze"], "degrade")).to.equal("degrade");

    setEnv("TEST_ENUM", "   ");
    expect(readEnum("TEST_ENUM", ["degrade", "freeze"], "freeze")).to.equal("freeze");
  });

  it("trims strings and treats blanks as unset", () => {
    setEnv("TEST_STRING", "  /tmp/topology.log ");
    expect(readOptionalString("TEST_STRING")).to.equal("/tmp/topology.log");

    setEnv("TEST_STRING", "");
    expect(readOptionalString("TEST_STRING")).to.equal(undefined);
  });

  it("loads the topology defaults", () => {
    setEnv("TOPOLOGY_LOG_LEVEL", undefined);
    setEnv("TOPOLOGY_LOG_FILE", undefined);
    setEnv("TOPOLOGY_MUTATION_MODE", undefined);
    expect(loadTopologyConfig()).to.deep.equal({ logLevel: "warn", logFile: null, mutationMode: "degrade" });
  });

  it("loads topology overrides and ignores invalid literals", () => {
    setEnv("TOPOLOGY_LOG_LEVEL", " DEBUG ");
    setEnv("TOPOLOGY_LOG_FILE", "./tmp/topology.log");
    setEnv("TOPOLOGY_MUTATION_MODE", "lock");
    expect(loadTopologyConfig()).to.deep.equal({
      logLevel: "debug",
      logFile: "./tmp/topology.log",
      mutationMode: "degrade",
    });
  });
});
