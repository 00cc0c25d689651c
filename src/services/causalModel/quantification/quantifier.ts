/**
 * @fileoverview Quantifies the conditional probability table of a node.
 *
 * For every sample draw, each link into the target gets the weight
 * `m1*m3 / Z`, where Z sums `m1*m3` over the links sharing its parent. The
 * per-parent probability aggregates `m2` with those weights (weighted mean
 * or weighted geometric mean), and every non-empty set of parents is then
 * combined by noisy-OR: `1 - prod(1 - p)`.
 * @module src/services/causalModel/quantification/quantifier
 */

import { writeFile } from "fs/promises";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import { toCsv } from "../export/csv.js";
import type { CausalLink } from "../core/modelTypes.js";
import { type SampleSummary, sampleEstimate, summarizeSamples } from "./estimate.js";
import type { RandomSource } from "./random.js";

export const AGGREGATION_METHODS = ["ARITHMETIC", "GEOMETRIC"] as const;
export type AggregationMethod = (typeof AGGREGATION_METHODS)[number];

/** Read access to the model needed for quantification. */
export interface QuantificationSource {
  hasNode(nodeId: string): boolean;
  /** Distinct parents of the node, sorted. */
  predecessors(nodeId: string): string[];
  /** Links from parent to child, ordered by edge key. */
  linksBetween(parentId: string, childId: string): CausalLink[];
}

export interface QuantifierOptions {
  sampleSize: number;
  maxParents: number;
  random: RandomSource;
}

export interface LinkWeight {
  linkId: string;
  parentId: string;
  edgeKey: number;
  weight: SampleSummary;
}

export interface ParentProbability {
  parentId: string;
  probability: SampleSummary;
}

export interface ConditionalProbabilityRow {
  parents: string[];
  probability: SampleSummary;
}

export interface QuantificationResult {
  targetNode: string;
  aggregationMethod: AggregationMethod;
  sampleSize: number;
  parents: string[];
  linkWeights: LinkWeight[];
  conditionalProbabilities: ParentProbability[];
  conditionalProbabilityTable: ConditionalProbabilityRow[];
}

interface SampledLink {
  link: CausalLink;
  m1: Float64Array;
  m2: Float64Array;
  m3: Float64Array;
}

/** Every `size`-element subset of `items`, in lexicographic index order. */
export function combinations<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  const current: T[] = [];
  const walk = (start: number): void => {
    if (current.length === size) {
      result.push([...current]);
      return;
    }
    for (let i = start; i <= items.length - (size - current.length); i += 1) {
      const item = items[i];
      if (item === undefined) continue;
      current.push(item);
      walk(i + 1);
      current.pop();
    }
  };
  walk(0);
  return result;
}

export class Quantifier {
  public readonly targetNode: string;
  public readonly parents: string[];
  private readonly source: QuantificationSource;
  private readonly options: QuantifierOptions;
  private result?: QuantificationResult;

  /**
   * @throws {McpError} NOT_FOUND for an unknown target; VALIDATION_ERROR when
   * the target has more parents than `options.maxParents`.
   */
  constructor(source: QuantificationSource, targetNode: string, options: QuantifierOptions) {
    if (!source.hasNode(targetNode)) {
      throw new McpError(BaseErrorCode.NOT_FOUND, `Node [${targetNode}] does not exist in the model.`);
    }
    this.source = source;
    this.targetNode = targetNode;
    this.options = options;
    this.parents = source.predecessors(targetNode);
    if (this.parents.length > options.maxParents) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Node [${targetNode}] has ${this.parents.length} parents; at most ${options.maxParents} can be quantified.`,
        { parents: this.parents, maxParents: options.maxParents },
      );
    }
  }

  public calculate(method: AggregationMethod): QuantificationResult {
    const size = this.options.sampleSize;
    const linkWeights: LinkWeight[] = [];
    const parentSamples = new Map<string, Float64Array>();

    for (const parentId of this.parents) {
      const sampled = this.source
        .linksBetween(parentId, this.targetNode)
        .map<SampledLink>((link) => ({
          link,
          m1: sampleEstimate(link.m1, size, this.options.random),
          m2: sampleEstimate(link.m2, size, this.options.random),
          m3: sampleEstimate(link.m3, size, this.options.random),
        }));
      const weights = this.normalizeWeights(sampled, size);

      sampled.forEach(({ link }, index) => {
        linkWeights.push({
          linkId: link.linkId,
          parentId,
          edgeKey: link.edgeKey,
          weight: summarizeSamples(weights[index] ?? new Float64Array(size)),
        });
      });
      parentSamples.set(parentId, this.aggregate(method, sampled, weights, size));
    }

    const conditionalProbabilities = this.parents.map<ParentProbability>((parentId) => ({
      parentId,
      probability: summarizeSamples(parentSamples.get(parentId) ?? new Float64Array(size)),
    }));

    const conditionalProbabilityTable: ConditionalProbabilityRow[] = [];
    for (let k = 1; k <= this.parents.length; k += 1) {
      for (const combo of combinations(this.parents, k)) {
        conditionalProbabilityTable.push({
          parents: combo,
          probability: summarizeSamples(this.noisyOr(combo, parentSamples, size)),
        });
      }
    }

    this.result = {
      targetNode: this.targetNode,
      aggregationMethod: method,
      sampleSize: size,
      parents: [...this.parents],
      linkWeights,
      conditionalProbabilities,
      conditionalProbabilityTable,
    };
    return this.result;
  }

  /** Per-sample weights of each link; equal shares when every m1*m3 is 0. */
  private normalizeWeights(sampled: SampledLink[], size: number): Float64Array[] {
    const weights = sampled.map(() => new Float64Array(size));
    for (let s = 0; s < size; s += 1) {
      let z = 0;
      for (const { m1, m3 } of sampled) {
        z += (m1[s] ?? 0) * (m3[s] ?? 0);
      }
      sampled.forEach(({ m1, m3 }, index) => {
        const target = weights[index];
        if (!target) return;
        target[s] = z > 0 ? ((m1[s] ?? 0) * (m3[s] ?? 0)) / z : 1 / sampled.length;
      });
    }
    return weights;
  }

  private aggregate(
    method: AggregationMethod,
    sampled: SampledLink[],
    weights: Float64Array[],
    size: number,
  ): Float64Array {
    const probability = new Float64Array(size);
    for (let s = 0; s < size; s += 1) {
      let value = method === "ARITHMETIC" ? 0 : 1;
      sampled.forEach(({ m2 }, index) => {
        const weight = weights[index]?.[s] ?? 0;
        const strength = m2[s] ?? 0;
        value = method === "ARITHMETIC" ? value + weight * strength : value * strength ** weight;
      });
      probability[s] = value;
    }
    return probability;
  }

  private noisyOr(combo: string[], parentSamples: Map<string, Float64Array>, size: number): Float64Array {
    const probability = new Float64Array(size);
    for (let s = 0; s < size; s += 1) {
      let none = 1;
      for (const parentId of combo) {
        none *= 1 - (parentSamples.get(parentId)?.[s] ?? 0);
      }
      probability[s] = 1 - none;
    }
    return probability;
  }

  /** The last result as CSV: `parents` (joined by `|`), `mean`, `p05`, `p95`. */
  public resultsToCsv(): string {
    if (!this.result) {
      throw new McpError(BaseErrorCode.INVALID_STATE, "Run calculate() before exporting the results.");
    }
    return toCsv(
      ["parents", "mean", "p05", "p95"],
      this.result.conditionalProbabilityTable.map((row) => [
        row.parents.join("|"),
        row.probability.mean,
        row.probability.p05,
        row.probability.p95,
      ]),
    );
  }

  /**
   * Writes {@link resultsToCsv} to `filePath`.
   * @throws {McpError} INVALID_STATE when `calculate` has not run.
   */
  public async exportResults(filePath: string): Promise<void> {
    await writeFile(filePath, this.resultsToCsv(), "utf-8");
  }
}
