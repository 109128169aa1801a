/**
 * Single-linkage clustering
 *
 * Candidates are linked when their combined similarity reaches the
 * threshold; each connected component of two or more is a group. A group's
 * confidence is its weakest pair, so a chain A-B-C with a poor A-C pair
 * reports the A-C similarity rather than the links that formed it.
 */

import type { SimilarityBreakdown } from '../types/index.js';

export interface PairSimilarity {
  a: number;
  b: number;
  similarity: SimilarityBreakdown;
}

export interface Cluster {
  /** Candidate indexes, ascending */
  members: number[];
  /** Every pair inside the cluster */
  pairs: PairSimilarity[];
  /** Minimum combined similarity over all pairs */
  confidence: number;
}

class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) {
      root = this.parent[root] ?? root;
    }
    // path compression
    let node = x;
    while (node !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  union(x: number, y: number): void {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX !== rootY) {
      this.parent[Math.max(rootX, rootY)] = Math.min(rootX, rootY);
    }
  }
}

export function singleLinkage(
  size: number,
  compare: (a: number, b: number) => SimilarityBreakdown,
  threshold: number
): Cluster[] {
  const pairs: PairSimilarity[] = [];
  const sets = new UnionFind(size);

  for (let a = 0; a < size; a++) {
    for (let b = a + 1; b < size; b++) {
      const similarity = compare(a, b);
      pairs.push({ a, b, similarity });
      if (similarity.combined >= threshold) {
        sets.union(a, b);
      }
    }
  }

  const members = new Map<number, number[]>();
  for (let i = 0; i < size; i++) {
    const root = sets.find(i);
    const list = members.get(root) ?? [];
    list.push(i);
    members.set(root, list);
  }

  const clusters: Cluster[] = [];
  for (const [root, list] of members) {
    if (list.length < 2) continue;
    const inside = pairs.filter(pair => sets.find(pair.a) === root && sets.find(pair.b) === root);
    clusters.push({
      members: list,
      pairs: inside,
      confidence: Math.min(...inside.map(pair => pair.similarity.combined)),
    });
  }
  return clusters;
}
