import { Graph } from "../graph/model.js";
import type { GraphOptions } from "../graph/options.js";
import { gproduct } from "../graph/product.js";
import type { CompositeKind } from "../graph/types.js";
import { createLinearTopology } from "./basic.js";
import { DimensionsView, canonicalizeDimensions, isOnePoint } from "./dimensions.js";
import { COMPOSITE_BASE } from "./shape.js";

/**
 * Multidimensional composite built as the left fold
 * `base(d1) ⊗ base(d2) ⊗ … ⊗ base(dk)` over the canonical dimensions.
 * `[1]` yields a single vertex and a single dimension yields the base topology
 * itself; the display name always lists the canonical dimensions.
 */
abstract class CompositeTopology extends Graph {
  private readonly canonical: readonly number[];

  protected constructor(kind: CompositeKind, dims: readonly number[], options: GraphOptions) {
    super(options);
    this.canonical = canonicalizeDimensions(dims);
    this.specialize({ kind, dimensions: this.canonical });
    if (isOnePoint(this.canonical)) {
      this.appendVertex(0);
    } else {
      this.adoptStructure(foldProduct(kind, this.canonical, options));
    }
    this.logger.debug("topology_composed", {
      kind,
      name: this.name,
      dimensions: [...this.canonical],
      vertices: this.numVertices,
      edges: this.numEdges,
    });
  }

  /** Canonical dimensions. Kept as-is once the graph has degraded to generic. */
  get dimensions(): DimensionsView {
    return new DimensionsView(this.canonical);
  }
}

function foldProduct(kind: CompositeKind, dimensions: readonly number[], options: GraphOptions): Graph {
  const base = COMPOSITE_BASE[kind];
  const [first, ...rest] = dimensions;
  let accumulator: Graph = createLinearTopology(base, first, options);
  for (const size of rest) {
    accumulator = gproduct(accumulator, createLinearTopology(base, size, options), options);
  }
  return accumulator;
}

/** Grid: Cartesian product of bidirectional chains. Diameter `Σ(di − 1)`. */
export class BGrid extends CompositeTopology {
  constructor(dims: readonly number[], options: GraphOptions = {}) {
    super("BGrid", dims, options);
  }
}

/** Torus: Cartesian product of bidirectional rings. Diameter `Σ⌊di/2⌋`. */
export class BTorus extends CompositeTopology {
  constructor(dims: readonly number[], options: GraphOptions = {}) {
    super("BTorus", dims, options);
  }
}
