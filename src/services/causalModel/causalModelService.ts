/**
 * @fileoverview Facade over the causal model: keeps the SQLite store and
 * the in-memory graph in step and enforces the model's integrity rules.
 * Node, link and reference ids live in separate namespaces.
 * @module src/services/causalModel/causalModelService
 */

import { config } from "../../config/index.js";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
  sanitization,
} from "../../utils/index.js";
import { getFirstTagValue, parseRis, type RisIssue } from "../RIS/index.js";
import { CausalGraph } from "./core/causalGraph.js";
import {
  type CausalLink,
  type CausalNode,
  CausalNodeSchema,
  type NewCausalLink,
  NewCausalLinkSchema,
  type Reference,
  RefIdSchema,
  ReferenceSchema,
} from "./core/modelTypes.js";
import { ModelStore } from "./core/modelStore.js";
import { exportModel, type ModelExportSummary } from "./export/modelExporter.js";
import { type AggregationMethod, type QuantificationResult, type QuantificationSource, Quantifier } from "./quantification/quantifier.js";
import { SeededRandom } from "./quantification/random.js";
import { risRecordToReference } from "./references/referenceMapper.js";

export interface CausalModelServiceOptions {
  dbPath: string;
  exportsPath: string;
  sampleSize: number;
  maxParents: number;
  randomSeed?: number;
}

export interface QuantifyOverrides {
  sampleSize?: number;
  seed?: number;
}

export interface RisImportResult {
  references: Reference[];
  warnings: RisIssue[];
}

export interface ModelSummary {
  nodes: string[];
  links: string[];
  references: string[];
}

const notFound = (kind: string, id: string): McpError =>
  new McpError(BaseErrorCode.NOT_FOUND, `${kind} [${id}] does not exist in the model.`, { id });

const conflict = (kind: string, id: string): McpError =>
  new McpError(BaseErrorCode.CONFLICT, `${kind} [${id}] already exists in the model.`, { id });

export class CausalModelService implements QuantificationSource {
  private readonly store: ModelStore;
  private readonly graph: CausalGraph;
  private readonly options: CausalModelServiceOptions;

  constructor(options: CausalModelServiceOptions) {
    this.options = options;
    this.store = new ModelStore(options.dbPath);
    this.graph = CausalGraph.fromEntities(this.store.allNodes(), this.store.allLinks());
  }

  public close(): void {
    this.store.close();
  }

  // --- Nodes ---

  public addNode(input: CausalNode): CausalNode {
    const node = CausalNodeSchema.parse(input);
    if (this.store.getNode(node.nodeId)) {
      throw conflict("Node", node.nodeId);
    }
    this.store.addNode(node);
    this.graph.addNode(node);
    return node;
  }

  public getNode(nodeId: string): CausalNode {
    const node = this.store.getNode(nodeId);
    if (!node) throw notFound("Node", nodeId);
    return node;
  }

  public hasNode(nodeId: string): boolean {
    return this.graph.hasNode(nodeId);
  }

  /** @returns Ids of the links removed with the node. */
  public removeNode(nodeId: string): string[] {
    if (!this.store.getNode(nodeId)) throw notFound("Node", nodeId);
    const removedLinks = this.store.removeNode(nodeId);
    this.graph.dropNode(nodeId);
    return removedLinks;
  }

  public nodes(): string[] {
    return this.store.nodeIds();
  }

  // --- Links ---

  /**
   * Adds a link and assigns its edge key.
   * @throws {McpError} CONFLICT for a used link id; NOT_FOUND for a missing
   * endpoint or reference; VALIDATION_ERROR for a link from a node to itself.
   */
  public addLink(input: NewCausalLink): CausalLink {
    const candidate = NewCausalLinkSchema.parse(input);
    if (this.store.getLink(candidate.linkId)) {
      throw conflict("Link", candidate.linkId);
    }
    if (candidate.parentId === candidate.childId) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Link [${candidate.linkId}] would connect node [${candidate.parentId}] to itself.`,
        { linkId: candidate.linkId, nodeId: candidate.parentId },
      );
    }
    if (!this.store.getNode(candidate.parentId)) throw notFound("Node", candidate.parentId);
    if (!this.store.getNode(candidate.childId)) throw notFound("Node", candidate.childId);
    if (candidate.refId !== undefined && !this.store.getReference(candidate.refId)) {
      throw notFound("Reference", candidate.refId);
    }

    const link: CausalLink = {
      ...candidate,
      edgeKey: this.graph.nextEdgeKey(candidate.parentId, candidate.childId),
    };
    this.store.addLink(link);
    this.graph.addLink(link);
    return link;
  }

  public getLink(linkId: string): CausalLink {
    const link = this.store.getLink(linkId);
    if (!link) throw notFound("Link", linkId);
    return link;
  }

  public removeLink(linkId: string): void {
    if (!this.store.removeLink(linkId)) throw notFound("Link", linkId);
    this.graph.dropLink(linkId);
  }

  public links(): string[] {
    return this.store.linkIds();
  }

  // --- References ---

  public addReference(input: Reference): Reference {
    const reference = ReferenceSchema.parse(input);
    if (this.store.getReference(reference.refId)) {
      throw conflict("Reference", reference.refId);
    }
    this.store.addReference(reference);
    return reference;
  }

  public getReference(refId: string): Reference {
    const reference = this.store.getReference(refId);
    if (!reference) throw notFound("Reference", refId);
    return reference;
  }

  /** @returns Ids of the links that cited the reference. */
  public removeReference(refId: string): string[] {
    if (!this.store.getReference(refId)) throw notFound("Reference", refId);
    const removedLinks = this.store.removeReference(refId);
    removedLinks.forEach((linkId) => this.graph.dropLink(linkId));
    return removedLinks;
  }

  public references(): string[] {
    return this.store.referenceIds();
  }

  public allReferences(): Reference[] {
    return this.store.allReferences();
  }

  /**
   * Parses `text` and stores one reference per record, all or none.
   *
   * With `refIds`, the i-th record gets the i-th id and the counts must match.
   * Otherwise a record keeps its `ID` tag when that is a usable id, and gets
   * `ref-<n>` (lowest free n from 1) when not.
   *
   * @throws {McpError} VALIDATION_ERROR when the RIS has errors, a record has
   * no title or the id count is wrong; CONFLICT when an id is already taken.
   */
  public importRis(text: string, refIds: string[] | undefined, context: RequestContext): RisImportResult {
    const { records, issues } = parseRis(text);
    const errors = issues.filter((issue) => issue.severity === "error");
    if (errors.length > 0) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `RIS input has ${errors.length} error(s); nothing was imported.`,
        { issues: errors },
      );
    }
    if (refIds && refIds.length !== records.length) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Received ${refIds.length} reference id(s) for ${records.length} RIS record(s).`,
        { refIdCount: refIds.length, recordCount: records.length },
      );
    }

    const stored = new Set(this.store.referenceIds());
    const requested: (string | undefined)[] = refIds
      ? [...refIds]
      : records.map((record) => {
          const tagged = RefIdSchema.safeParse(getFirstTagValue(record, "ID"));
          return tagged.success ? tagged.data : undefined;
        });
    // Generated ids skip ids claimed anywhere in the file.
    const reserved = new Set([...stored, ...requested.filter((id): id is string => id !== undefined)]);
    let counter = 1;
    const nextGeneratedId = (): string => {
      while (reserved.has(`ref-${counter}`)) counter += 1;
      reserved.add(`ref-${counter}`);
      return `ref-${counter}`;
    };

    const assigned = new Set<string>();
    const references = records.map((record, index) => {
      const refId = requested[index] ?? nextGeneratedId();
      if (stored.has(refId)) {
        throw conflict("Reference", refId);
      }
      if (assigned.has(refId)) {
        throw new McpError(
          BaseErrorCode.CONFLICT,
          `Reference id [${refId}] is claimed by more than one RIS record.`,
          { id: refId },
        );
      }
      assigned.add(refId);
      return risRecordToReference(record, refId);
    });

    this.store.addReferences(references);
    const warnings = issues.filter((issue) => issue.severity === "warning");
    logger.info("Imported references from RIS", {
      ...context,
      imported: references.length,
      warnings: warnings.length,
    });
    return { references, warnings };
  }

  // --- Whole model ---

  public summary(): ModelSummary {
    return { nodes: this.nodes(), links: this.links(), references: this.references() };
  }

  public clear(): void {
    this.store.clear();
    this.graph.clear();
  }

  public predecessors(nodeId: string): string[] {
    if (!this.graph.hasNode(nodeId)) throw notFound("Node", nodeId);
    return this.graph.predecessors(nodeId);
  }

  public linksBetween(parentId: string, childId: string): CausalLink[] {
    return this.graph.linksBetween(parentId, childId).map((linkId) => this.getLink(linkId));
  }

  public toDot(): string {
    return this.graph.toDot();
  }

  /** A quantifier for `nodeId`, seeded from the overrides or the service options. */
  public createQuantifier(nodeId: string, overrides: QuantifyOverrides = {}): Quantifier {
    return new Quantifier(this, nodeId, {
      sampleSize: overrides.sampleSize ?? this.options.sampleSize,
      maxParents: this.options.maxParents,
      random: new SeededRandom(overrides.seed ?? this.options.randomSeed),
    });
  }

  public quantify(
    nodeId: string,
    method: AggregationMethod,
    overrides: QuantifyOverrides = {},
  ): QuantificationResult {
    return this.createQuantifier(nodeId, overrides).calculate(method);
  }

  /** Resolves `name` inside the exports directory, rejecting names that leave it. */
  public resolveExportPath(name: string): string {
    return sanitization.sanitizePath(name, { rootDir: this.options.exportsPath });
  }

  /** Exports the model into the directory `name` under the exports directory. */
  public async exportModel(name: string, context: RequestContext): Promise<ModelExportSummary> {
    return exportModel(this.store, this.graph, this.resolveExportPath(name), context);
  }
}

let instance: CausalModelService | undefined;

/** Lazily opens the service on the configured database. */
export function getCausalModelService(): CausalModelService {
  if (!instance) {
    instance = new CausalModelService({
      dbPath: config.modelDbPath,
      exportsPath: config.exportsPath,
      sampleSize: config.quantification.sampleSize,
      maxParents: config.quantification.maxParents,
      randomSeed: config.quantification.randomSeed,
    });
    logger.info(
      "Causal model opened",
      requestContextService.createRequestContext({
        operation: "getCausalModelService",
        dbPath: config.modelDbPath,
        nodes: instance.nodes().length,
      }),
    );
  }
  return instance;
}

/** Closes the open service, if any. */
export function closeCausalModelService(): void {
  instance?.close();
  instance = undefined;
}
