/**
 * @fileoverview Writes the whole model to a directory: one CSV per table,
 * the references as RIS, the graph as DOT and a copy of the database.
 * @module src/services/causalModel/export/modelExporter
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { logger, type RequestContext } from "../../../utils/index.js";
import { formatRis } from "../../RIS/index.js";
import type { CausalGraph } from "../core/causalGraph.js";
import type { CausalLink, CausalNode, Reference } from "../core/modelTypes.js";
import type { ModelStore } from "../core/modelStore.js";
import { referenceToRisRecord } from "../references/referenceMapper.js";
import { type CsvValue, toCsv } from "./csv.js";

export const EXPORT_FILES = {
  nodes: "nodes.csv",
  links: "links.csv",
  references: "references.csv",
  ris: "references.ris",
  dot: "model.dot",
  database: "causal-model.sqlite",
} as const;

export interface ModelExportSummary {
  directory: string;
  files: string[];
  nodeCount: number;
  linkCount: number;
  referenceCount: number;
}

const NODE_COLUMNS = ["node_id", "name", "keywords"];

const LINK_COLUMNS = [
  "link_id",
  "parent_id",
  "child_id",
  "m1_type",
  "m1_a",
  "m1_b",
  "m2_type",
  "m2_a",
  "m2_b",
  "m3_type",
  "m3_a",
  "m3_b",
  "m1_memo",
  "m2_memo",
  "m3_memo",
  "ref_id",
  "edge_key",
];

const REFERENCE_COLUMNS = ["ref_id", "title", "authors", "year", "publication_type", "publisher"];

const nodeRow = (node: CausalNode): CsvValue[] => [node.nodeId, node.name, node.keywords];

const linkRow = (link: CausalLink): CsvValue[] => [
  link.linkId,
  link.parentId,
  link.childId,
  link.m1.type,
  link.m1.a,
  link.m1.b,
  link.m2.type,
  link.m2.a,
  link.m2.b,
  link.m3.type,
  link.m3.a,
  link.m3.b,
  link.m1Memo,
  link.m2Memo,
  link.m3Memo,
  link.refId,
  link.edgeKey,
];

const referenceRow = (reference: Reference): CsvValue[] => [
  reference.refId,
  reference.title,
  reference.authors?.join("; "),
  reference.year,
  reference.publicationType,
  reference.publisher,
];

/**
 * Exports the model into `directory`, creating it when missing. Existing
 * files with the same names are overwritten.
 */
export async function exportModel(
  store: ModelStore,
  graph: CausalGraph,
  directory: string,
  context: RequestContext,
): Promise<ModelExportSummary> {
  await mkdir(directory, { recursive: true });

  const nodes = store.allNodes();
  const links = store.allLinks();
  const references = store.allReferences();
  const target = (file: string): string => path.join(directory, file);

  await writeFile(target(EXPORT_FILES.nodes), toCsv(NODE_COLUMNS, nodes.map(nodeRow)), "utf-8");
  await writeFile(target(EXPORT_FILES.links), toCsv(LINK_COLUMNS, links.map(linkRow)), "utf-8");
  await writeFile(
    target(EXPORT_FILES.references),
    toCsv(REFERENCE_COLUMNS, references.map(referenceRow)),
    "utf-8",
  );
  await writeFile(target(EXPORT_FILES.ris), formatRis(references.map(referenceToRisRecord)), "utf-8");
  await writeFile(target(EXPORT_FILES.dot), graph.toDot(), "utf-8");
  await store.backup(target(EXPORT_FILES.database));

  const summary: ModelExportSummary = {
    directory,
    files: Object.values(EXPORT_FILES),
    nodeCount: nodes.length,
    linkCount: links.length,
    referenceCount: references.length,
  };
  logger.info("Causal model exported", { ...context, ...summary });
  return summary;
}
