import { InvalidArgumentError } from "../errors.js";
import { VertexIdSchema } from "../validation.js";
import { Graph } from "./model.js";
import { resolveGraphOptions, type GraphOptions } from "./options.js";
import type { EdgeRecord } from "./types.js";

/** Symbol joining the factor names of a product. */
export const TENSOR_SYMBOL = "⊗";

/**
 * Cartesian product `g1 ⊗ g2`.
 *
 * The result holds one vertex per pair `(u, v)`, enumerated with `u` from
 * `g1.vertices` as the outer loop, and identified by `u * |V(g2)| + v` where
 * `u` and `v` are the factors' ids (not positions). Ids are therefore dense
 * and collision-free only when both factors use `0..N-1`; other id ranges give
 * a consistent but possibly colliding numbering. An encoded id outside the
 * 32-bit signed range raises {@link InvalidArgumentError}. Edges are wired by
 * position and copy the factor edge's attributes: first `(u1, v) → (u2, v)`
 * for every edge of `g1` and every `v`, then `(u, v1) → (u, v2)` for every `u`
 * and every edge of `g2`.
 *
 * The result is always a new generic graph named `"<g1> ⊗ <g2>"`.
 */
export function gproduct(g1: Graph, g2: Graph, options: GraphOptions = {}): Graph {
  const left = g1.structure();
  const right = g2.structure();
  const width = right.vertices.length;

  const vertices: number[] = [];
  for (const u of left.vertices) {
    for (const v of right.vertices) {
      const id = u * width + v;
      if (!VertexIdSchema.safeParse(id).success) {
        throw new InvalidArgumentError(`product vertex id ${id} (from ${u} and ${v}) leaves the 32-bit range`, {
          hint: "number the factor vertices 0..N-1",
        });
      }
      vertices.push(id);
    }
  }

  const edges: EdgeRecord[] = [];
  for (const edge of left.edges) {
    for (let b = 0; b < width; b += 1) {
      edges.push({ source: edge.source * width + b, target: edge.target * width + b, attributes: edge.attributes });
    }
  }
  for (let a = 0; a < left.vertices.length; a += 1) {
    for (const edge of right.edges) {
      edges.push({ source: a * width + edge.source, target: a * width + edge.target, attributes: edge.attributes });
    }
  }

  const name = `${g1.name} ${TENSOR_SYMBOL} ${g2.name}`;
  const product = Graph.fromStructure({ name, vertices, edges }, options);
  resolveGraphOptions(options).logger.debug("graph_product_built", {
    left: g1.name,
    right: g2.name,
    vertices: vertices.length,
    edges: edges.length,
  });
  return product;
}

/**
 * Operator form of {@link gproduct}: `tensor(a, b, c)` is `(a ⊗ b) ⊗ c`.
 */
export function tensor(first: Graph, second: Graph, ...rest: Graph[]): Graph {
  let product = gproduct(first, second);
  for (const factor of rest) {
    product = gproduct(product, factor);
  }
  return product;
}
