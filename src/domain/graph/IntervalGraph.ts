/**
 * Comparison graph over named Asymmetric Interval Numbers
 *
 * Each node holds an AIN; edge weights come from the stochastic comparison
 * P(X > Y). Directed graphs weight u → v by P(u > v). Undirected graphs weight
 * a pair by 4p(1 − p), which peaks at 1 when the order of the two values is a
 * coin flip and falls to 0 when one dominates.
 */

import { AIN } from '../../core/ain/AIN';
import { gt } from '../../core/comparison/stochastic';
import {
  DEFAULT_EDGE_DECIMALS,
  DEFAULT_GRAPH_OPTIONS,
  GraphOptions,
} from '../../core/config';
import { AINError, ErrorCode } from '../../core/errors';

export interface GraphEdge {
  source: string;
  target: string;
  weight: number;
}

function roundWeight(value: number): number {
  return Number(value.toFixed(DEFAULT_EDGE_DECIMALS));
}

function pairUncertainty(p: number): number {
  return 4 * p * (1 - p);
}

/**
 * h(p) = −(p·log2 p + (1 − p)·log2(1 − p)), with 0·log2 0 = 0
 */
function binaryEntropy(p: number): number {
  if (p <= 0 || p >= 1) return 0;
  return -(p * Math.log2(p) + (1 - p) * Math.log2(1 - p));
}

export class IntervalGraph {
  readonly directed: boolean;
  readonly edgeThreshold: number;
  readonly dominanceOnly: boolean;

  private readonly nodes = new Map<string, AIN>();
  // source -> target -> weight; undirected edges are stored in both directions
  private readonly adjacency = new Map<string, Map<string, number>>();

  constructor(options: GraphOptions = {}) {
    const resolved = { ...DEFAULT_GRAPH_OPTIONS, ...options };

    if (!(resolved.edgeThreshold >= 0 && resolved.edgeThreshold <= 1)) {
      throw new AINError(
        ErrorCode.INVALID_CONFIG,
        `edgeThreshold must be between 0 and 1, got ${resolved.edgeThreshold}`,
        { edgeThreshold: resolved.edgeThreshold }
      );
    }
    if (resolved.dominanceOnly && !resolved.directed) {
      throw new AINError(
        ErrorCode.INVALID_CONFIG,
        'dominanceOnly can only be enabled for directed graphs'
      );
    }

    this.directed = resolved.directed;
    this.edgeThreshold = resolved.edgeThreshold;
    this.dominanceOnly = resolved.dominanceOnly;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.adjacency.values()) {
      count += targets.size;
    }
    return this.directed ? count : count / 2;
  }

  nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  getNode(name: string): AIN | undefined {
    return this.nodes.get(name);
  }

  /**
   * Add a node and weigh its edges against every existing node
   */
  addNode(name: string, value: AIN): void {
    if (name.length === 0) {
      throw new AINError(ErrorCode.INVALID_INPUT, 'Node name must not be empty');
    }
    if (!AIN.isAIN(value)) {
      throw new AINError(ErrorCode.INVALID_INPUT, `Node '${name}' must hold an AIN`);
    }
    if (this.nodes.has(name)) {
      throw new AINError(ErrorCode.INVALID_INPUT, `Node '${name}' already exists in the graph`, {
        name,
      });
    }

    const existing = this.nodeNames();
    this.nodes.set(name, value);
    this.adjacency.set(name, new Map());

    for (const other of existing) {
      if (!this.directed) {
        this.addUndirectedEdge(name, other);
      } else if (this.dominanceOnly) {
        this.addDominantEdge(name, other);
      } else {
        this.addDirectedEdge(name, other);
        this.addDirectedEdge(other, name);
      }
    }
  }

  hasEdge(source: string, target: string): boolean {
    return this.adjacency.get(source)?.has(target) ?? false;
  }

  getEdgeWeight(source: string, target: string): number | undefined {
    return this.adjacency.get(source)?.get(target);
  }

  /**
   * Number of incident edges; in- plus out-edges for directed graphs
   */
  degree(name: string): number {
    const targets = this.requireAdjacency(name);
    if (!this.directed) {
      return targets.size;
    }

    let incoming = 0;
    for (const sources of this.adjacency.values()) {
      if (sources.has(name)) incoming++;
    }
    return targets.size + incoming;
  }

  /**
   * Edges in node insertion order; undirected edges are listed once
   */
  edges(): GraphEdge[] {
    const order = new Map(this.nodeNames().map((name, index) => [name, index]));
    const result: GraphEdge[] = [];

    for (const [source, targets] of this.adjacency) {
      for (const [target, weight] of targets) {
        if (!this.directed && (order.get(target) ?? 0) < (order.get(source) ?? 0)) {
          continue;
        }
        result.push({ source, target, weight });
      }
    }
    return result;
  }

  /**
   * Weighted adjacency matrix, rows and columns in insertion order
   */
  adjacencyMatrix(): number[][] {
    const names = this.nodeNames();
    return names.map((source) => names.map((target) => this.getEdgeWeight(source, target) ?? 0));
  }

  /**
   * Mean pairwise uncertainty 4p(1 − p) over every pair of nodes, edges
   * dropped by the threshold included
   */
  averageUncertainty(): number {
    return this.pairAverage('Average uncertainty', pairUncertainty);
  }

  /**
   * Mean binary entropy of P(X_j > X_i) over every pair of nodes
   */
  graphEntropy(): number {
    return this.pairAverage('Graph entropy', binaryEntropy);
  }

  summary(): string {
    const rule = '='.repeat(50);
    const arrow = this.directed ? '->' : '--';
    return [
      rule,
      `Graph Type: ${this.directed ? 'Directed' : 'Undirected'}`,
      `Number of Nodes: ${this.nodeCount}`,
      `Number of Edges: ${this.edgeCount}`,
      rule,
      'Nodes:',
      ...[...this.nodes].map(([name, value]) => `  ${name}: ${value.toString()}`),
      rule,
      'Edges (with weights):',
      ...this.edges().map(
        ({ source, target, weight }) => `  ${source} ${arrow} ${target}: ${weight.toFixed(4)}`
      ),
      rule,
    ].join('\n');
  }

  toString(): string {
    return `IntervalGraph(${this.directed ? 'Directed' : 'Undirected'}, nodes=${this.nodeCount}, edges=${this.edgeCount})`;
  }

  private requireAdjacency(name: string): Map<string, number> {
    const targets = this.adjacency.get(name);
    if (!targets) {
      throw new AINError(ErrorCode.INVALID_INPUT, `Node '${name}' is not in the graph`, { name });
    }
    return targets;
  }

  private requireNode(name: string): AIN {
    const value = this.nodes.get(name);
    if (!value) {
      throw new AINError(ErrorCode.INVALID_INPUT, `Node '${name}' is not in the graph`, { name });
    }
    return value;
  }

  private setEdge(source: string, target: string, weight: number): void {
    this.requireAdjacency(source).set(target, weight);
  }

  private addDirectedEdge(source: string, target: string): void {
    const weight = roundWeight(gt(this.requireNode(source), this.requireNode(target)));
    if (weight > this.edgeThreshold) {
      this.setEdge(source, target, weight);
    }
  }

  private addDominantEdge(u: string, v: string): void {
    const pUV = gt(this.requireNode(u), this.requireNode(v));
    const pVU = gt(this.requireNode(v), this.requireNode(u));

    let source: string;
    let target: string;
    if (pUV !== pVU) {
      [source, target] = pUV > pVU ? [u, v] : [v, u];
    } else {
      [source, target] = u < v ? [u, v] : [v, u];
    }

    const weight = Math.max(pUV, pVU);
    if (weight > this.edgeThreshold) {
      this.setEdge(source, target, weight);
    }
  }

  private addUndirectedEdge(u: string, v: string): void {
    const p = gt(this.requireNode(v), this.requireNode(u));
    const weight = roundWeight(pairUncertainty(p));
    if (weight > this.edgeThreshold) {
      this.setEdge(u, v, weight);
      this.setEdge(v, u, weight);
    }
  }

  private pairAverage(metric: string, score: (p: number) => number): number {
    if (this.directed) {
      throw new AINError(
        ErrorCode.DOMAIN_ERROR,
        `${metric} is only defined for undirected graphs`
      );
    }

    const values = [...this.nodes.values()];
    const n = values.length;
    if (n < 2) return 0;

    let total = 0;
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        total += score(gt(values[j], values[i]));
      }
    }
    return (2 * total) / (n * (n - 1));
  }
}
