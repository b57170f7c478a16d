import type { MutationMode } from "../config/topology.js";
import { ImmutableTopologyError, InvalidArgumentError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import {
  closedFormDiameter,
  closedFormEdgeCount,
  closedFormVertexCount,
  topologyLabel,
} from "../topology/shape.js";
import { parseVertexId } from "../validation.js";
import { computeDiameter, eccentricities } from "./diameter.js";
import { resolveGraphOptions, type GraphOptions } from "./options.js";
import {
  DEFAULT_EDGE_ATTRIBUTES,
  GENERIC_NAME,
  GENERIC_TOPOLOGY,
  type EdgeAttributes,
  type EdgeData,
  type EdgePair,
  type EdgeRecord,
  type GraphSummary,
  type SpecializedTopology,
  type Topology,
  type VertexRecord,
} from "./types.js";

/** Positional description accepted by {@link Graph.fromStructure}. */
export interface GraphStructure {
  readonly name: string;
  /** Vertex ids, in storage order. */
  readonly vertices: readonly number[];
  /** Edges whose endpoints are positions in {@link vertices}. */
  readonly edges: readonly EdgeRecord[];
}

/**
 * Directed multigraph with caller-assigned integer vertex ids, per-edge
 * latency/bandwidth payload and a display name.
 *
 * Every graph carries a {@link Topology} tag. Fixed-pattern generators and
 * composites set it to their shape, which then drives the closed-form counts
 * and diameter; plain graphs and Cartesian products stay `Generic` and fall
 * back to counting and BFS. Vertices and edges are never removed.
 */
export class Graph {
  private readonly vertexList: VertexRecord[] = [];
  private readonly edgeList: EdgeRecord[] = [];
  private readonly adjacency: number[][] = [];
  private displayName: string = GENERIC_NAME;
  private shape: Topology = GENERIC_TOPOLOGY;
  protected readonly logger: StructuredLogger;
  protected readonly mutationMode: MutationMode;

  constructor(options: GraphOptions = {}) {
    const resolved = resolveGraphOptions(options);
    this.logger = resolved.logger;
    this.mutationMode = resolved.mutationMode;
  }

  /**
   * Builds a generic graph from positional data. Used by the product engine,
   * which wires edges by position so colliding ids cannot misroute them.
   */
  static fromStructure(structure: GraphStructure, options: GraphOptions = {}): Graph {
    const graph = new Graph(options);
    for (const id of structure.vertices) {
      graph.appendVertex(id);
    }
    const order = structure.vertices.length;
    for (const edge of structure.edges) {
      if (!isPosition(edge.source, order) || !isPosition(edge.target, order)) {
        throw new InvalidArgumentError(
          `edge ${edge.source} -> ${edge.target} references a vertex position outside 0..${order - 1}`,
        );
      }
      graph.appendEdge(edge.source, edge.target, edge.attributes);
    }
    graph.displayName = structure.name;
    return graph;
  }

  get name(): string {
    return this.displayName;
  }

  get topology(): Topology {
    return this.shape;
  }

  get numVertices(): number {
    return closedFormVertexCount(this.shape) ?? this.vertexList.length;
  }

  get numEdges(): number {
    return closedFormEdgeCount(this.shape) ?? this.edgeList.length;
  }

  /** Vertex ids in insertion order. */
  get vertices(): number[] {
    return this.vertexList.map((vertex) => vertex.id);
  }

  /** `[sourceId, targetId]` pairs in insertion order. */
  get edges(): EdgePair[] {
    return this.edgeList.map((edge) => [this.idAt(edge.source), this.idAt(edge.target)] as const);
  }

  /**
   * Longest shortest path, `-1` when the graph is empty or not strongly
   * connected. Specialised topologies answer from their shape; generic graphs
   * run the BFS engine on every read.
   */
  get diameter(): number {
    return closedFormDiameter(this.shape) ?? computeDiameter(this.adjacency);
  }

  /** BFS eccentricity per vertex (storage order), `null` when a vertex does not reach every other one. */
  eccentricities(): Array<number | null> {
    return eccentricities(this.adjacency);
  }

  /** Appends a vertex carrying {@link id}. Ids are not checked for uniqueness. */
  addVertex(id: number): void {
    const vertexId = parseVertexId(id);
    this.applyMutationPolicy("addVertex");
    this.appendVertex(vertexId);
  }

  /**
   * Appends a directed edge between the first vertex whose id is {@link i} and
   * the first whose id is {@link j}. Missing endpoints make the call a no-op.
   */
  addEdge(i: number, j: number, attributes: Partial<EdgeAttributes> = {}): void {
    this.applyMutationPolicy("addEdge");
    const source = this.positionOf(i);
    const target = this.positionOf(j);
    if (source < 0 || target < 0) {
      return;
    }
    this.appendEdge(source, target, {
      latency: attributes.latency ?? DEFAULT_EDGE_ATTRIBUTES.latency,
      bandwidth: attributes.bandwidth ?? DEFAULT_EDGE_ATTRIBUTES.bandwidth,
    });
  }

  hasVertex(id: number): boolean {
    return this.positionOf(id) >= 0;
  }

  hasEdge(i: number, j: number): boolean {
    return this.edgeList.some((edge) => this.idAt(edge.source) === i && this.idAt(edge.target) === j);
  }

  /** Out-neighbour ids of the first vertex carrying {@link id}, in edge order. */
  neighbors(id: number): number[] {
    const position = this.positionOf(id);
    if (position < 0) {
      return [];
    }
    return this.adjacency[position].map((target) => this.idAt(target));
  }

  /** Edges with their endpoint ids and attribute payload, in insertion order. */
  listEdges(): EdgeData[] {
    return this.edgeList.map((edge) => ({
      source: this.idAt(edge.source),
      target: this.idAt(edge.target),
      latency: edge.attributes.latency,
      bandwidth: edge.attributes.bandwidth,
    }));
  }

  summary(): GraphSummary {
    return {
      name: this.name,
      kind: this.shape.kind,
      vertices: this.numVertices,
      edges: this.numEdges,
      diameter: this.diameter,
    };
  }

  /** Positional snapshot of the storage, the inverse of {@link Graph.fromStructure}. */
  structure(): GraphStructure {
    return {
      name: this.displayName,
      vertices: this.vertices,
      edges: this.edgeList.map((edge) => ({ ...edge })),
    };
  }

  protected appendVertex(id: number): number {
    this.vertexList.push({ id });
    this.adjacency.push([]);
    return this.vertexList.length - 1;
  }

  protected appendEdge(source: number, target: number, attributes: EdgeAttributes = DEFAULT_EDGE_ATTRIBUTES): void {
    this.edgeList.push({ source, target, attributes });
    this.adjacency[source].push(target);
  }

  /** Copies the storage of {@link source} into this (empty) graph. */
  protected adoptStructure(source: Graph): void {
    for (const vertex of source.vertexList) {
      this.appendVertex(vertex.id);
    }
    for (const edge of source.edgeList) {
      this.appendEdge(edge.source, edge.target, edge.attributes);
    }
  }

  /** Tags the graph with its shape and the matching display name. */
  protected specialize(topology: SpecializedTopology): void {
    this.shape = topology;
    this.displayName = topologyLabel(topology);
  }

  /**
   * Mutation policy. A specialised graph either degrades to `Generic` (and is
   * renamed accordingly) or, in freeze mode, rejects the mutation outright.
   * The transition happens even when the mutation itself turns out a no-op.
   */
  private applyMutationPolicy(operation: "addVertex" | "addEdge"): void {
    const current = this.shape;
    if (current.kind === "Generic") {
      return;
    }
    if (this.mutationMode === "freeze") {
      this.logger.warn("topology_mutation_rejected", { kind: current.kind, name: this.displayName, operation });
      throw new ImmutableTopologyError(current.kind, operation);
    }
    this.logger.info("topology_degraded", { from: current.kind, name: this.displayName, operation });
    this.shape = GENERIC_TOPOLOGY;
    this.displayName = GENERIC_NAME;
  }

  private positionOf(id: number): number {
    return this.vertexList.findIndex((vertex) => vertex.id === id);
  }

  private idAt(position: number): number {
    return this.vertexList[position].id;
  }
}

function isPosition(value: number, order: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < order;
}
