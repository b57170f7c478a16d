import type { CompositeKind, LinearKind, SpecializedTopology, Topology } from "../graph/types.js";

/** Fixed-pattern topology folded by each composite kind. */
export const COMPOSITE_BASE: Record<CompositeKind, LinearKind> = {
  BGrid: "BMesh",
  BTorus: "BRing",
};

/** Number of edges materialised by a fixed-pattern topology of size {@link n}. */
export function linearEdgeCount(kind: LinearKind, n: number): number {
  switch (kind) {
    case "URing":
      return n > 1 ? n : 0;
    case "BRing":
      return n > 1 ? 2 * n : 0;
    case "UMesh":
      return n > 1 ? n - 1 : 0;
    case "BMesh":
      return n > 1 ? 2 * (n - 1) : 0;
  }
}

/** Closed-form diameter of a fixed-pattern topology of size {@link n}. */
export function linearDiameter(kind: LinearKind, n: number): number {
  if (n <= 1) {
    return 0;
  }
  switch (kind) {
    case "URing":
    case "BRing":
      return Math.floor(n / 2);
    case "UMesh":
    case "BMesh":
      return n - 1;
  }
}

/** Vertex count of a Cartesian product of factors of the given sizes. */
export function productVertexCount(sizes: readonly number[]): number {
  return sizes.reduce((product, size) => product * size, 1);
}

/**
 * Edge count of the left fold `base(d1) ⊗ … ⊗ base(dk)`, using
 * `|E(A ⊗ B)| = |V(A)|·|E(B)| + |E(A)|·|V(B)|` at every step.
 */
export function productEdgeCount(kind: LinearKind, sizes: readonly number[]): number {
  let vertices = 1;
  let edges = 0;
  for (const size of sizes) {
    edges = vertices * linearEdgeCount(kind, size) + edges * size;
    vertices *= size;
  }
  return edges;
}

/** Closed-form vertex count, `null` for generic graphs. */
export function closedFormVertexCount(topology: Topology): number | null {
  switch (topology.kind) {
    case "Generic":
      return null;
    case "OPG":
      return 1;
    case "BGrid":
    case "BTorus":
      return productVertexCount(topology.dimensions);
    default:
      return topology.dimension;
  }
}

/** Closed-form edge count, `null` for generic graphs. */
export function closedFormEdgeCount(topology: Topology): number | null {
  switch (topology.kind) {
    case "Generic":
      return null;
    case "OPG":
      return 0;
    case "BGrid":
    case "BTorus":
      return productEdgeCount(COMPOSITE_BASE[topology.kind], topology.dimensions);
    default:
      return linearEdgeCount(topology.kind, topology.dimension);
  }
}

/**
 * Closed-form diameter, `null` for generic graphs. Composites add the
 * per-factor diameters: `Σ(di − 1)` for grids and `Σ⌊di/2⌋` for tori.
 */
export function closedFormDiameter(topology: Topology): number | null {
  switch (topology.kind) {
    case "Generic":
      return null;
    case "OPG":
      return 0;
    case "BGrid":
    case "BTorus": {
      const base = COMPOSITE_BASE[topology.kind];
      return topology.dimensions.reduce((sum, size) => sum + linearDiameter(base, size), 0);
    }
    default:
      return linearDiameter(topology.kind, topology.dimension);
  }
}

/**
 * Display label of a specialised topology. Composites list their canonical
 * dimensions, with the one-point sentinel `[1]` rendered as `[]`.
 */
export function topologyLabel(topology: SpecializedTopology): string {
  switch (topology.kind) {
    case "BGrid":
    case "BTorus": {
      const dims = topology.dimensions;
      const degenerate = dims.length === 1 && dims[0] === 1;
      return `${topology.kind}[${degenerate ? "" : dims.join(",")}]`;
    }
    default:
      return topology.kind;
  }
}
