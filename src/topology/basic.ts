import { Graph } from "../graph/model.js";
import type { GraphOptions } from "../graph/options.js";
import type { EdgePair, LinearKind } from "../graph/types.js";
import { parseSize } from "../validation.js";

/**
 * Edge pattern of a fixed-pattern topology over vertices `0..n-1`, in
 * insertion order. Bidirectional kinds emit the forward edge of every hop
 * followed by its reverse.
 */
export function linearEdges(kind: LinearKind, n: number): EdgePair[] {
  const edges: EdgePair[] = [];
  const wraps = kind === "URing" || kind === "BRing";
  const bidirectional = kind === "BRing" || kind === "BMesh";
  if (n <= 1) {
    return edges;
  }
  const hops = wraps ? n : n - 1;
  for (let i = 0; i < hops; i += 1) {
    const next = (i + 1) % n;
    edges.push([i, next]);
    if (bidirectional) {
      edges.push([next, i]);
    }
  }
  return edges;
}

/**
 * Ring or chain over `n` vertices with ids `0..n-1`. Sizes of zero (or
 * anything that is not a non-negative integer) raise `InvalidArgumentError`.
 */
abstract class LinearTopology extends Graph {
  private readonly size: number;

  protected constructor(kind: LinearKind, n: number, options: GraphOptions) {
    super(options);
    this.size = parseSize(n, `${kind} size`);
    this.specialize({ kind, dimension: this.size });
    for (let id = 0; id < this.size; id += 1) {
      this.appendVertex(id);
    }
    for (const [source, target] of linearEdges(kind, this.size)) {
      this.appendEdge(source, target);
    }
  }

  /** Construction size. Kept as-is once the graph has degraded to generic. */
  get dimension(): number {
    return this.size;
  }
}

/** Unidirectional ring `0 → 1 → … → n-1 → 0`. */
export class URing extends LinearTopology {
  constructor(n: number, options: GraphOptions = {}) {
    super("URing", n, options);
  }
}

/** Bidirectional ring. */
export class BRing extends LinearTopology {
  constructor(n: number, options: GraphOptions = {}) {
    super("BRing", n, options);
  }
}

/** Unidirectional chain `0 → 1 → … → n-1`. */
export class UMesh extends LinearTopology {
  constructor(n: number, options: GraphOptions = {}) {
    super("UMesh", n, options);
  }
}

/** Bidirectional chain. */
export class BMesh extends LinearTopology {
  constructor(n: number, options: GraphOptions = {}) {
    super("BMesh", n, options);
  }
}

/** One-point graph: the single vertex `0`, no edges. Identity of the Cartesian product. */
export class OPG extends Graph {
  constructor(options: GraphOptions = {}) {
    super(options);
    this.specialize({ kind: "OPG", dimension: 1 });
    this.appendVertex(0);
  }

  get dimension(): 1 {
    return 1;
  }
}

export type LinearTopologyGraph = URing | BRing | UMesh | BMesh;

export function createLinearTopology(kind: LinearKind, n: number, options: GraphOptions = {}): LinearTopologyGraph {
  switch (kind) {
    case "URing":
      return new URing(n, options);
    case "BRing":
      return new BRing(n, options);
    case "UMesh":
      return new UMesh(n, options);
    case "BMesh":
      return new BMesh(n, options);
  }
}
