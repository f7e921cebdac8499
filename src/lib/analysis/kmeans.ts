/**
 * Deterministic k-means over small dense vectors.
 *
 * Initialization is farthest-point: the first vector seeds the first
 * centroid, each further centroid is the vector farthest from every chosen
 * centroid (lowest index on ties). Assignment ties go to the lowest cluster
 * index. Same input, same output.
 */

export interface KMeansResult {
  assignments: number[];
  centroids: number[][];
  iterations: number;
}

export function squaredDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - (b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

export function countDistinct(vectors: number[][]): number {
  return new Set(vectors.map((v) => v.join(","))).size;
}

function initCentroids(vectors: number[][], k: number): number[][] {
  const centroids = [[...vectors[0]]];
  while (centroids.length < k) {
    let best = -1;
    let bestDistance = 0;
    vectors.forEach((v, i) => {
      const nearest = Math.min(...centroids.map((c) => squaredDistance(v, c)));
      if (nearest > bestDistance) {
        best = i;
        bestDistance = nearest;
      }
    });
    if (best < 0) break;
    centroids.push([...vectors[best]]);
  }
  return centroids;
}

function nearestCentroid(v: number[], centroids: number[][]): number {
  let best = 0;
  let bestDistance = Infinity;
  centroids.forEach((c, i) => {
    const d = squaredDistance(v, c);
    if (d < bestDistance) {
      best = i;
      bestDistance = d;
    }
  });
  return best;
}

function meanOf(members: number[][], dims: number): number[] {
  const mean = new Array<number>(dims).fill(0);
  for (const m of members) {
    for (let d = 0; d < dims; d++) mean[d] += m[d];
  }
  return mean.map((x) => x / members.length);
}

export function kmeans(vectors: number[][], k: number, maxIterations: number): KMeansResult {
  if (vectors.length === 0 || k <= 0) return { assignments: [], centroids: [], iterations: 0 };

  const dims = vectors[0].length;
  const clusterCount = Math.min(k, countDistinct(vectors));
  let centroids = initCentroids(vectors, clusterCount);
  let assignments: number[] = [];
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;
    const next = vectors.map((v) => nearestCentroid(v, centroids));
    const stable = next.length === assignments.length && next.every((a, i) => a === assignments[i]);
    assignments = next;
    if (stable) break;

    centroids = centroids.map((previous, c) => {
      const members = vectors.filter((_, i) => assignments[i] === c);
      // An emptied cluster keeps its last position
      return members.length > 0 ? meanOf(members, dims) : previous;
    });
  }

  return { assignments, centroids, iterations };
}
