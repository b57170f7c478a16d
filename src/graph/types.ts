/**
 * Shared type definitions describing the in-memory representation of the
 * directed multigraphs handled by the package. Keeping the types centralised
 * prevents circular dependencies between the graph model, the product engine
 * and the topology closed forms.
 */

/** Per-edge payload. Neither value is read by any algorithm of the package. */
export interface EdgeAttributes {
  readonly latency: number;
  readonly bandwidth: number;
}

export const DEFAULT_EDGE_ATTRIBUTES: EdgeAttributes = Object.freeze({ latency: 0, bandwidth: 0 });

/** Vertex as stored by the graph: only its caller-assigned id. */
export interface VertexRecord {
  readonly id: number;
}

/**
 * Edge as stored by the graph. Endpoints are positions in the vertex list, not
 * ids, since ids are not guaranteed to be unique.
 */
export interface EdgeRecord {
  readonly source: number;
  readonly target: number;
  readonly attributes: EdgeAttributes;
}

/** `[sourceId, targetId]` pair exposed by the `edges` view. */
export type EdgePair = readonly [source: number, target: number];

/** Edge exposed by `listEdges()`: endpoint ids plus the attribute payload. */
export interface EdgeData extends EdgeAttributes {
  readonly source: number;
  readonly target: number;
}

/** Fixed-pattern topologies parameterised by a single size. */
export type LinearKind = "URing" | "BRing" | "UMesh" | "BMesh";

/** Multidimensional composites parameterised by a canonical dimension list. */
export type CompositeKind = "BGrid" | "BTorus";

export type TopologyKind = LinearKind | "OPG" | CompositeKind | "Generic";

/**
 * Shape record carried alongside the graph storage. Every variant but
 * `Generic` enables the closed-form counts and diameter.
 */
export type Topology =
  | { readonly kind: LinearKind; readonly dimension: number }
  | { readonly kind: "OPG"; readonly dimension: 1 }
  | { readonly kind: CompositeKind; readonly dimensions: readonly number[] }
  | { readonly kind: "Generic" };

export type SpecializedTopology = Exclude<Topology, { readonly kind: "Generic" }>;

export const GENERIC_TOPOLOGY: Topology = Object.freeze({ kind: "Generic" });

/** Display name of every graph that carries no shape record. */
export const GENERIC_NAME = "Generic";

/** Compact description returned by `Graph#summary()`. */
export interface GraphSummary {
  readonly name: string;
  readonly kind: TopologyKind;
  readonly vertices: number;
  readonly edges: number;
  readonly diameter: number;
}
