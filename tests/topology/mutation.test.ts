import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { ImmutableTopologyError, InvalidArgumentError } from "../../src/errors.js";
import { Graph } from "../../src/graph/model.js";
import { StructuredLogger, type LogEntry } from "../../src/logger.js";
import { BMesh, BRing, OPG, UMesh, URing } from "../../src/topology/basic.js";
import { BGrid, BTorus } from "../../src/topology/composite.js";

function captureLogger(entries: LogEntry[]): StructuredLogger {
  return new StructuredLogger({ level: "debug", silent: true, onEntry: (entry) => entries.push(entry) });
}

describe("mutation policy", () => {
  const originalMode = process.env.TOPOLOGY_MUTATION_MODE;

  afterEach(() => {
    if (originalMode === undefined) {
      delete process.env.TOPOLOGY_MUTATION_MODE;
    } else {
      process.env.TOPOLOGY_MUTATION_MODE = originalMode;
    }
  });

  it("turns every specialised topology generic after one added vertex", () => {
    const topologies: Graph[] = [
      new URing(4),
      new BRing(4),
      new UMesh(4),
      new BMesh(4),
      new OPG(),
      new BGrid([3, 2]),
      new BTorus([3, 3]),
    ];
    for (const topology of topologies) {
      const before = topology.vertices.length;
      topology.addVertex(100);
      expect(topology.name).to.equal("Generic");
      expect(topology.topology).to.deep.equal({ kind: "Generic" });
      expect(topology.hasVertex(100)).to.equal(true);
      expect(topology.numVertices).to.equal(before + 1);
    }
  });

  it("keeps the requested edge and switches the diameter to BFS", () => {
    const ring = new URing(4);
    expect(ring.diameter).to.equal(2);
    ring.addEdge(0, 2);
    expect(ring.name).to.equal("Generic");
    expect(ring.hasEdge(0, 2)).to.equal(true);
    expect(ring.numEdges).to.equal(5);
    expect(ring.diameter).to.equal(3);
  });

  it("reports -1 once a disconnected vertex joins a chain", () => {
    const chain = new BMesh(3);
    chain.addVertex(3);
    expect(chain.diameter).to.equal(-1);
  });

  it("degrades even when the added edge is a no-op", () => {
    const ring = new BRing(3);
    ring.addEdge(0, 99);
    expect(ring.name).to.equal("Generic");
    expect(ring.numEdges).to.equal(6);
  });

  it("stays generic on further mutations and keeps the stale shape", () => {
    const grid = new BGrid([4, 2]);
    const ring = new URing(6);
    grid.addEdge(0, 7);
    ring.addVertex(6);
    ring.addVertex(7);
    expect(ring.name).to.equal("Generic");
    expect(ring.dimension).to.equal(6);
    expect(ring.numVertices).to.equal(8);
    expect(grid.dimensions.toArray()).to.deep.equal([4, 2]);
    expect(grid.numEdges).to.equal(grid.edges.length);
  });

  it("validates the id before changing state", () => {
    const point = new OPG();
    expect(() => point.addVertex(0.5)).to.throw(InvalidArgumentError);
    expect(point.name).to.equal("OPG");
    expect(point.numVertices).to.equal(1);
  });

  it("logs the transition", () => {
    const entries: LogEntry[] = [];
    const ring = new BRing(3, { logger: captureLogger(entries) });
    ring.addEdge(0, 2);
    expect(entries).to.have.length(1);
    expect(entries[0].level).to.equal("info");
    expect(entries[0].message).to.equal("topology_degraded");
    expect(entries[0].payload).to.deep.equal({ from: "BRing", name: "BRing", operation: "addEdge" });
  });

  describe("freeze mode", () => {
    it("rejects mutations of specialised topologies", () => {
      const entries: LogEntry[] = [];
      const ring = new BRing(3, { mutationMode: "freeze", logger: captureLogger(entries) });
      try {
        ring.addEdge(0, 2);
        expect.fail("frozen ring should reject addEdge");
      } catch (error) {
        expect(error).to.be.instanceOf(ImmutableTopologyError);
        if (error instanceof ImmutableTopologyError) {
          expect(error.code).to.equal("E-TOPO-IMMUTABLE");
          expect(error.details).to.deep.equal({ kind: "BRing", operation: "addEdge" });
        }
      }
      expect(ring.name).to.equal("BRing");
      expect(ring.edges).to.have.length(6);
      expect(entries.map((entry) => [entry.level, entry.message])).to.deep.equal([
        ["warn", "topology_mutation_rejected"],
      ]);
    });

    it("applies to composites", () => {
      const logger = captureLogger([]);
      const torus = new BTorus([3, 3], { mutationMode: "freeze", logger });
      expect(() => torus.addVertex(9)).to.throw(ImmutableTopologyError);
      expect(torus.vertices).to.have.length(9);
    });

    it("leaves generic graphs mutable", () => {
      const graph = new Graph({ mutationMode: "freeze" });
      graph.addVertex(1);
      graph.addVertex(2);
      graph.addEdge(1, 2);
      expect(graph.edges).to.deep.equal([[1, 2]]);
    });

    it("can be selected through the environment", () => {
      process.env.TOPOLOGY_MUTATION_MODE = "freeze";
      const point = new OPG({ logger: captureLogger([]) });
      expect(() => point.addVertex(1)).to.throw(ImmutableTopologyError);
    });
  });
});
