/**
 * @fileoverview In-memory directed multigraph mirroring the stored model.
 * Nodes are keyed by node id and edges by link id, so parallel links
 * between the same pair of nodes coexist.
 * @module src/services/causalModel/core/causalGraph
 */

import { MultiDirectedGraph } from "graphology";
import type { CausalLink, CausalNode } from "./modelTypes.js";

type NodeAttributes = {
  name?: string;
};

type LinkAttributes = {
  edgeKey: number;
  refId?: string;
};

const escapeDot = (value: string): string => value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

export class CausalGraph {
  private readonly graph = new MultiDirectedGraph<NodeAttributes, LinkAttributes>();

  public static fromEntities(nodes: CausalNode[], links: CausalLink[]): CausalGraph {
    const causalGraph = new CausalGraph();
    nodes.forEach((node) => causalGraph.addNode(node));
    links.forEach((link) => causalGraph.addLink(link));
    return causalGraph;
  }

  public get nodeCount(): number {
    return this.graph.order;
  }

  public get linkCount(): number {
    return this.graph.size;
  }

  public hasNode(nodeId: string): boolean {
    return this.graph.hasNode(nodeId);
  }

  public hasLink(linkId: string): boolean {
    return this.graph.hasEdge(linkId);
  }

  public addNode(node: CausalNode): void {
    this.graph.addNode(node.nodeId, { name: node.name });
  }

  /** Drops the node together with every link touching it. */
  public dropNode(nodeId: string): void {
    if (this.graph.hasNode(nodeId)) {
      this.graph.dropNode(nodeId);
    }
  }

  public addLink(link: CausalLink): void {
    this.graph.addDirectedEdgeWithKey(link.linkId, link.parentId, link.childId, {
      edgeKey: link.edgeKey,
      refId: link.refId,
    });
  }

  public dropLink(linkId: string): void {
    if (this.graph.hasEdge(linkId)) {
      this.graph.dropEdge(linkId);
    }
  }

  public clear(): void {
    this.graph.clear();
  }

  /**
   * Key for a new link from `parentId` to `childId`: the number of existing
   * parallel links, increased until it is unused.
   */
  public nextEdgeKey(parentId: string, childId: string): number {
    if (!this.graph.hasNode(parentId) || !this.graph.hasNode(childId)) {
      return 0;
    }
    const usedKeys = new Set(
      this.graph
        .outEdges(parentId, childId)
        .map((edge) => this.graph.getEdgeAttribute(edge, "edgeKey")),
    );
    let key = usedKeys.size;
    while (usedKeys.has(key)) {
      key += 1;
    }
    return key;
  }

  /** Distinct parents of `nodeId`, sorted. */
  public predecessors(nodeId: string): string[] {
    return [...this.graph.inNeighbors(nodeId)].sort();
  }

  /** Ids of the links from `parentId` to `childId`, ordered by edge key. */
  public linksBetween(parentId: string, childId: string): string[] {
    if (!this.graph.hasNode(parentId) || !this.graph.hasNode(childId)) {
      return [];
    }
    return this.graph
      .outEdges(parentId, childId)
      .sort(
        (left, right) =>
          this.graph.getEdgeAttribute(left, "edgeKey") - this.graph.getEdgeAttribute(right, "edgeKey"),
      );
  }

  /** Graphviz DOT rendering; nodes are labelled by name when they have one. */
  public toDot(graphName = "causal_model"): string {
    const lines = [`digraph "${escapeDot(graphName)}" {`];
    [...this.graph.nodes()].sort().forEach((nodeId) => {
      const label = this.graph.getNodeAttribute(nodeId, "name") ?? nodeId;
      lines.push(`  "${escapeDot(nodeId)}" [label="${escapeDot(label)}"];`);
    });
    [...this.graph.edges()].sort().forEach((linkId) => {
      const source = this.graph.source(linkId);
      const target = this.graph.target(linkId);
      const edgeKey = this.graph.getEdgeAttribute(linkId, "edgeKey");
      lines.push(
        `  "${escapeDot(source)}" -> "${escapeDot(target)}" [id="${escapeDot(linkId)}", key=${edgeKey}];`,
      );
    });
    lines.push("}");
    return `${lines.join("\n")}\n`;
  }
}
