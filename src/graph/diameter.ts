/**
 * Out-neighbour positions per vertex position. The graph model keeps one such
 * list per vertex so the traversals never resolve ids.
 */
export type Adjacency = ReadonlyArray<ReadonlyArray<number>>;

/** Sentinel reported when the diameter is undefined (empty or not strongly connected). */
export const UNDEFINED_DIAMETER = -1;

/**
 * Breadth-first search from {@link source}. Returns the hop distance to every
 * vertex position, `-1` for positions that cannot be reached.
 */
export function bfsDistances(adjacency: Adjacency, source: number): number[] {
  const distances = new Array<number>(adjacency.length).fill(-1);
  distances[source] = 0;
  const queue: number[] = [source];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    const base = distances[current];
    for (const next of adjacency[current]) {
      if (distances[next] === -1) {
        distances[next] = base + 1;
        queue.push(next);
      }
    }
  }

  return distances;
}

/**
 * Eccentricity of every vertex: the largest distance to any other vertex, or
 * `null` when some vertex is unreachable from it.
 */
export function eccentricities(adjacency: Adjacency): Array<number | null> {
  const result: Array<number | null> = [];
  for (let source = 0; source < adjacency.length; source += 1) {
    let eccentricity = 0;
    let reachedAll = true;
    for (const distance of bfsDistances(adjacency, source)) {
      if (distance < 0) {
        reachedAll = false;
        break;
      }
      eccentricity = Math.max(eccentricity, distance);
    }
    result.push(reachedAll ? eccentricity : null);
  }
  return result;
}

/**
 * All-pairs BFS diameter in O(V·(V+E)). Empty graphs and graphs that are not
 * strongly connected report {@link UNDEFINED_DIAMETER}; a single vertex reports 0.
 */
export function computeDiameter(adjacency: Adjacency): number {
  if (adjacency.length === 0) {
    return UNDEFINED_DIAMETER;
  }
  let diameter = 0;
  for (const eccentricity of eccentricities(adjacency)) {
    if (eccentricity === null) {
      return UNDEFINED_DIAMETER;
    }
    diameter = Math.max(diameter, eccentricity);
  }
  return diameter;
}
