/**
 * @fileoverview SQLite persistence for nodes, links and references.
 * Links reference their nodes and their supporting reference through
 * foreign keys; removing a node or a reference removes the links that
 * depend on it in the same transaction.
 * @module src/services/causalModel/core/modelStore
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import path from "path";
import { z } from "zod";
import {
  type CausalLink,
  type CausalNode,
  type EstimateSpec,
  EstimateSpecSchema,
  type Reference,
} from "./modelTypes.js";

interface NodeRow {
  node_id: string;
  name: string | null;
  keywords: string | null;
}

interface ReferenceRow {
  ref_id: string;
  title: string;
  authors: string | null;
  year: string | null;
  publication_type: string | null;
  publisher: string | null;
}

interface LinkRow {
  link_id: string;
  parent_id: string;
  child_id: string;
  m1_type: string;
  m1_a: number;
  m1_b: number;
  m2_type: string;
  m2_a: number;
  m2_b: number;
  m3_type: string;
  m3_a: number;
  m3_b: number;
  m1_memo: string | null;
  m2_memo: string | null;
  m3_memo: string | null;
  ref_id: string | null;
  edge_key: number;
}

const AuthorsColumnSchema = z.array(z.string());

const SCHEMA_SQL = `
  create table if not exists nodes(
    node_id text primary key,
    name text,
    keywords text
  );
  create table if not exists sources(
    ref_id text primary key,
    title text not null,
    authors text,
    year text,
    publication_type text,
    publisher text
  );
  create table if not exists links(
    link_id text primary key,
    parent_id text not null,
    child_id text not null,
    m1_type text not null,
    m1_a real not null,
    m1_b real not null,
    m2_type text not null,
    m2_a real not null,
    m2_b real not null,
    m3_type text not null,
    m3_a real not null,
    m3_b real not null,
    m1_memo text,
    m2_memo text,
    m3_memo text,
    ref_id text,
    edge_key integer not null,
    foreign key(parent_id) references nodes(node_id),
    foreign key(child_id) references nodes(node_id),
    foreign key(ref_id) references sources(ref_id),
    unique(parent_id, child_id, edge_key)
  );
`;

const orUndefined = <T>(value: T | null): T | undefined => (value === null ? undefined : value);

function toEstimate(type: string, a: number, b: number): EstimateSpec {
  return EstimateSpecSchema.parse({ type, a, b });
}

function nodeFromRow(row: NodeRow): CausalNode {
  return { nodeId: row.node_id, name: orUndefined(row.name), keywords: orUndefined(row.keywords) };
}

function referenceFromRow(row: ReferenceRow): Reference {
  return {
    refId: row.ref_id,
    title: row.title,
    year: orUndefined(row.year),
    authors: row.authors === null ? undefined : AuthorsColumnSchema.parse(JSON.parse(row.authors)),
    publicationType: orUndefined(row.publication_type),
    publisher: orUndefined(row.publisher),
  };
}

function linkFromRow(row: LinkRow): CausalLink {
  return {
    linkId: row.link_id,
    parentId: row.parent_id,
    childId: row.child_id,
    m1: toEstimate(row.m1_type, row.m1_a, row.m1_b),
    m2: toEstimate(row.m2_type, row.m2_a, row.m2_b),
    m3: toEstimate(row.m3_type, row.m3_a, row.m3_b),
    m1Memo: orUndefined(row.m1_memo),
    m2Memo: orUndefined(row.m2_memo),
    m3Memo: orUndefined(row.m3_memo),
    refId: orUndefined(row.ref_id),
    edgeKey: row.edge_key,
  };
}

function linkToRow(link: CausalLink): LinkRow {
  return {
    link_id: link.linkId,
    parent_id: link.parentId,
    child_id: link.childId,
    m1_type: link.m1.type,
    m1_a: link.m1.a,
    m1_b: link.m1.b,
    m2_type: link.m2.type,
    m2_a: link.m2.a,
    m2_b: link.m2.b,
    m3_type: link.m3.type,
    m3_a: link.m3.a,
    m3_b: link.m3.b,
    m1_memo: link.m1Memo ?? null,
    m2_memo: link.m2Memo ?? null,
    m3_memo: link.m3Memo ?? null,
    ref_id: link.refId ?? null,
    edge_key: link.edgeKey,
  };
}

function referenceToRow(reference: Reference): ReferenceRow {
  return {
    ref_id: reference.refId,
    title: reference.title,
    authors: reference.authors ? JSON.stringify(reference.authors) : null,
    year: reference.year ?? null,
    publication_type: reference.publicationType ?? null,
    publisher: reference.publisher ?? null,
  };
}

export class ModelStore {
  public readonly filePath: string;
  private readonly db: Database.Database;

  /**
   * Opens (or creates) the database at `filePath`; `":memory:"` keeps it in
   * process.
   */
  constructor(filePath: string) {
    this.filePath = filePath;
    if (filePath !== ":memory:") {
      mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.pragma("foreign_keys = ON");
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(SCHEMA_SQL);
  }

  public close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // --- Nodes ---

  public addNode(node: CausalNode): void {
    this.db
      .prepare<NodeRow>("insert into nodes values (@node_id, @name, @keywords)")
      .run({ node_id: node.nodeId, name: node.name ?? null, keywords: node.keywords ?? null });
  }

  public getNode(nodeId: string): CausalNode | undefined {
    const row = this.db
      .prepare<[string], NodeRow>("select * from nodes where node_id = ?")
      .get(nodeId);
    return row ? nodeFromRow(row) : undefined;
  }

  /**
   * Removes the node and every link touching it.
   * @returns Ids of the removed links.
   */
  public removeNode(nodeId: string): string[] {
    const remove = this.db.transaction((id: string): string[] => {
      const linkIds = this.db
        .prepare<[string, string], { link_id: string }>(
          "select link_id from links where parent_id = ? or child_id = ? order by link_id",
        )
        .all(id, id)
        .map((row) => row.link_id);
      this.db.prepare<[string, string]>("delete from links where parent_id = ? or child_id = ?").run(id, id);
      this.db.prepare<[string]>("delete from nodes where node_id = ?").run(id);
      return linkIds;
    });
    return remove(nodeId);
  }

  public nodeIds(): string[] {
    return this.db
      .prepare<[], { node_id: string }>("select node_id from nodes order by node_id")
      .all()
      .map((row) => row.node_id);
  }

  public allNodes(): CausalNode[] {
    return this.db
      .prepare<[], NodeRow>("select * from nodes order by node_id")
      .all()
      .map(nodeFromRow);
  }

  // --- Links ---

  public addLink(link: CausalLink): void {
    this.db
      .prepare<LinkRow>(
        `insert into links values (
          @link_id, @parent_id, @child_id,
          @m1_type, @m1_a, @m1_b,
          @m2_type, @m2_a, @m2_b,
          @m3_type, @m3_a, @m3_b,
          @m1_memo, @m2_memo, @m3_memo,
          @ref_id, @edge_key)`,
      )
      .run(linkToRow(link));
  }

  public getLink(linkId: string): CausalLink | undefined {
    const row = this.db
      .prepare<[string], LinkRow>("select * from links where link_id = ?")
      .get(linkId);
    return row ? linkFromRow(row) : undefined;
  }

  /** @returns Whether a link was deleted. */
  public removeLink(linkId: string): boolean {
    return this.db.prepare<[string]>("delete from links where link_id = ?").run(linkId).changes > 0;
  }

  public linkIds(): string[] {
    return this.db
      .prepare<[], { link_id: string }>("select link_id from links order by link_id")
      .all()
      .map((row) => row.link_id);
  }

  public allLinks(): CausalLink[] {
    return this.db
      .prepare<[], LinkRow>("select * from links order by link_id")
      .all()
      .map(linkFromRow);
  }

  // --- References ---

  public addReference(reference: Reference): void {
    this.insertReference(referenceToRow(reference));
  }

  /** Inserts all references or none. */
  public addReferences(references: Reference[]): void {
    const insertAll = this.db.transaction((rows: ReferenceRow[]) => {
      for (const row of rows) {
        this.insertReference(row);
      }
    });
    insertAll(references.map(referenceToRow));
  }

  private insertReference(row: ReferenceRow): void {
    this.db
      .prepare<ReferenceRow>(
        `insert into sources values (
          @ref_id, @title, @authors, @year, @publication_type, @publisher)`,
      )
      .run(row);
  }

  public getReference(refId: string): Reference | undefined {
    const row = this.db
      .prepare<[string], ReferenceRow>("select * from sources where ref_id = ?")
      .get(refId);
    return row ? referenceFromRow(row) : undefined;
  }

  /**
   * Removes the reference and every link citing it.
   * @returns Ids of the removed links.
   */
  public removeReference(refId: string): string[] {
    const remove = this.db.transaction((id: string): string[] => {
      const linkIds = this.db
        .prepare<[string], { link_id: string }>(
          "select link_id from links where ref_id = ? order by link_id",
        )
        .all(id)
        .map((row) => row.link_id);
      this.db.prepare<[string]>("delete from links where ref_id = ?").run(id);
      this.db.prepare<[string]>("delete from sources where ref_id = ?").run(id);
      return linkIds;
    });
    return remove(refId);
  }

  public referenceIds(): string[] {
    return this.db
      .prepare<[], { ref_id: string }>("select ref_id from sources order by ref_id")
      .all()
      .map((row) => row.ref_id);
  }

  public allReferences(): Reference[] {
    return this.db
      .prepare<[], ReferenceRow>("select * from sources order by ref_id")
      .all()
      .map(referenceFromRow);
  }

  // --- Whole model ---

  /** Drops and recreates every table. */
  public clear(): void {
    this.db.transaction(() => {
      this.db.exec("drop table if exists links; drop table if exists sources; drop table if exists nodes;");
      this.createTables();
    })();
  }

  /** Writes a consistent copy of the database to `destination`. */
  public async backup(destination: string): Promise<void> {
    await this.db.backup(destination);
  }
}
