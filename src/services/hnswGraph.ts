// src/services/hnswGraph.ts
// What: Layered navigable-small-world graph (HNSW) for approximate nearest-neighbor search.
// How: Each node gets a level from an FNV-1a hash of its id rather than a random draw, so the graph depends only
//      on the entries and their insertion order; rebuilding from persisted entries reproduces it exactly.
//      Upper layers are walked greedily, layer 0 with a best-first search of width ef. Scores are dot products
//      of unit vectors; ties go to the lower sequence number.

import { dot } from '../util/vector.js';

export interface GraphEntry {
  id: string;
  seq: number;
  vector: Float32Array; // unit length
}

export interface ScoredEntry {
  entry: GraphEntry;
  score: number;
}

export interface HnswOptions {
  // Links per node on upper layers; layer 0 keeps twice as many.
  maxNeighbors: number;
  efConstruction: number;
}

interface HnswNode {
  entry: GraphEntry;
  level: number;
  links: HnswNode[][];
}

interface Scored {
  node: HnswNode;
  score: number;
}

const MAX_LEVEL = 16;

/** Descending score, then ascending insertion sequence. */
export function compareScored(a: { score: number; entry: GraphEntry }, b: { score: number; entry: GraphEntry }): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.entry.seq - b.entry.seq;
}

function compareNodes(a: Scored, b: Scored): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.node.entry.seq - b.node.entry.seq;
}

function insertSorted(list: Scored[], item: Scored): void {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const candidate = list[mid];
    if (candidate && compareNodes(candidate, item) <= 0) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, item);
}

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HnswGraph {
  private readonly nodes = new Map<string, HnswNode>();
  private entryPoint: HnswNode | null = null;
  private readonly levelFactor: number;

  constructor(private readonly options: HnswOptions) {
    this.levelFactor = 1 / Math.log(Math.max(2, options.maxNeighbors));
  }

  get size(): number {
    return this.nodes.size;
  }

  get topLevel(): number {
    return this.entryPoint?.level ?? -1;
  }

  levelFor(id: string): number {
    // Map the hash into (0, 1] so the logarithm stays finite.
    const u = (fnv1a(id) + 1) / 0x100000000;
    return Math.min(MAX_LEVEL, Math.floor(-Math.log(u) * this.levelFactor));
  }

  add(entry: GraphEntry): void {
    if (this.nodes.has(entry.id)) return;
    const level = this.levelFor(entry.id);
    const node: HnswNode = {
      entry,
      level,
      links: Array.from({ length: level + 1 }, () => []),
    };
    this.nodes.set(entry.id, node);

    const top = this.entryPoint;
    if (!top) {
      this.entryPoint = node;
      return;
    }

    let current: Scored = { node: top, score: dot(entry.vector, top.entry.vector) };
    for (let layer = top.level; layer > level; layer--) {
      current = this.greedy(entry.vector, current, layer);
    }

    for (let layer = Math.min(level, top.level); layer >= 0; layer--) {
      const candidates = this.searchLayer(entry.vector, [current], this.options.efConstruction, layer);
      const neighbors = candidates.slice(0, this.options.maxNeighbors);
      node.links[layer] = neighbors.map((c) => c.node);
      for (const neighbor of neighbors) {
        this.link(neighbor.node, node, layer);
      }
      const best = candidates[0];
      if (best) current = best;
    }

    if (level > top.level) this.entryPoint = node;
  }

  search(query: Float32Array, k: number, ef: number): ScoredEntry[] {
    const top = this.entryPoint;
    if (!top || k <= 0) return [];

    let current: Scored = { node: top, score: dot(query, top.entry.vector) };
    for (let layer = top.level; layer > 0; layer--) {
      current = this.greedy(query, current, layer);
    }
    const found = this.searchLayer(query, [current], Math.max(ef, k), 0);
    return found.slice(0, k).map((s) => ({ entry: s.node.entry, score: s.score }));
  }

  private link(from: HnswNode, to: HnswNode, layer: number): void {
    const links = from.links[layer];
    if (!links) return;
    links.push(to);
    const cap = layer === 0 ? this.options.maxNeighbors * 2 : this.options.maxNeighbors;
    if (links.length <= cap) return;

    // Keep the closest links to `from`.
    const ranked: Scored[] = [];
    for (const n of links) insertSorted(ranked, { node: n, score: dot(from.entry.vector, n.entry.vector) });
    from.links[layer] = ranked.slice(0, cap).map((s) => s.node);
  }

  private greedy(query: Float32Array, start: Scored, layer: number): Scored {
    let current = start;
    let improved = true;
    while (improved) {
      improved = false;
      for (const neighbor of current.node.links[layer] ?? []) {
        const candidate: Scored = { node: neighbor, score: dot(query, neighbor.entry.vector) };
        if (compareNodes(candidate, current) < 0) {
          current = candidate;
          improved = true;
        }
      }
    }
    return current;
  }

  private searchLayer(query: Float32Array, entryPoints: Scored[], ef: number, layer: number): Scored[] {
    const visited = new Set<HnswNode>();
    const candidates: Scored[] = [];
    const results: Scored[] = [];

    for (const ep of entryPoints) {
      visited.add(ep.node);
      insertSorted(candidates, ep);
      insertSorted(results, ep);
    }

    while (candidates.length > 0) {
      const closest = candidates.shift();
      if (!closest) break;
      const worst = results[results.length - 1];
      if (worst && results.length >= ef && compareNodes(closest, worst) > 0) break;

      for (const neighbor of closest.node.links[layer] ?? []) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        const scored: Scored = { node: neighbor, score: dot(query, neighbor.entry.vector) };
        const tail = results[results.length - 1];
        if (results.length < ef || (tail && compareNodes(scored, tail) < 0)) {
          insertSorted(candidates, scored);
          insertSorted(results, scored);
          if (results.length > ef) results.pop();
        }
      }
    }

    return results;
  }
}
