import { logger } from '../utils/debug-logger';

/**
 * Include graph between resource paths.
 *
 * An edge `from -> to` means `from` includes `to` (directly or through other
 * files). Lookups in both directions are O(1); `findAffected` walks the
 * incoming edges to answer "who has to be rebuilt when `to` changes".
 */
export class DependencyGraph {
  private _nodes: Set<string> = new Set();
  private _outEdges: Map<string, Set<string>> = new Map();
  private _inEdges: Map<string, Set<string>> = new Map();

  addNode(node: string): void {
    this._nodes.add(node);
    if (!this._outEdges.has(node)) {
      this._outEdges.set(node, new Set());
    }
    if (!this._inEdges.has(node)) {
      this._inEdges.set(node, new Set());
    }
  }

  /**
   * Adds an include edge; both nodes are created if needed.
   * @param from The including file
   * @param to The included file
   */
  addEdge(from: string, to: string): void {
    this.addNode(from);
    this.addNode(to);
    this.edgeSet(this._outEdges, from).add(to);
    this.edgeSet(this._inEdges, to).add(from);
  }

  /**
   * Drops every edge leaving `node`, e.g. before its includes are re-analyzed.
   * Nodes are kept.
   */
  removeOutEdges(node: string): void {
    const targets = this._outEdges.get(node);
    if (!targets) {
      return;
    }
    for (const target of targets) {
      this._inEdges.get(target)?.delete(node);
    }
    targets.clear();
  }

  nodes(): string[] {
    return [...this._nodes];
  }

  /** Files `node` includes */
  outEdges(node: string): string[] {
    return [...(this._outEdges.get(node) ?? [])];
  }

  /** Files that include `node` */
  inEdges(node: string): string[] {
    return [...(this._inEdges.get(node) ?? [])];
  }

  hasNode(node: string): boolean {
    return this._nodes.has(node);
  }

  hasEdge(from: string, to: string): boolean {
    return this._outEdges.get(from)?.has(to) ?? false;
  }

  get nodeCount(): number {
    return this._nodes.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const edges of this._outEdges.values()) {
      count += edges.size;
    }
    return count;
  }

  /**
   * Breadth-first walk from `changed` along incoming edges. The result always
   * contains `changed` itself and terminates on cyclic input.
   */
  findAffected(changed: string): Set<string> {
    const affected = new Set<string>([changed]);
    const queue: string[] = [changed];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      for (const parent of this._inEdges.get(current) ?? []) {
        if (!affected.has(parent)) {
          affected.add(parent);
          queue.push(parent);
        }
      }
    }

    if (affected.size > 1) {
      logger.debug(`Affected paths (${affected.size}):`, affected);
    }
    return affected;
  }

  clear(): void {
    this._nodes.clear();
    this._outEdges.clear();
    this._inEdges.clear();
  }

  toJSON() {
    const nodes = this.nodes();
    const links = nodes.flatMap((from) =>
      this.outEdges(from).map((to) => ({ source: from, target: to })),
    );

    return {
      nodes: nodes.map((id) => ({ id })),
      links,
    };
  }

  private edgeSet(map: Map<string, Set<string>>, node: string): Set<string> {
    let edges = map.get(node);
    if (!edges) {
      edges = new Set();
      map.set(node, edges);
    }
    return edges;
  }
}
