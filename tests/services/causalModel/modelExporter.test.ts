import { mkdtempSync, readFileSync, readdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CausalModelService,
  escapeCsvValue,
  ModelStore,
  toCsv,
} from "../../../src/services/causalModel/index.js";
import { requestContextService } from "../../../src/utils/index.js";
import { link } from "./fixtures.js";

describe("csv", () => {
  it("quotes values holding separators, quotes or line breaks", () => {
    expect(escapeCsvValue("plain")).toBe("plain");
    expect(escapeCsvValue("a,b")).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue("two\nlines")).toBe('"two\nlines"');
    expect(escapeCsvValue(undefined)).toBe("");
    expect(escapeCsvValue(0.25)).toBe("0.25");
  });

  it("writes a header and CRLF terminated rows", () => {
    expect(toCsv(["id", "name"], [["n1", "Smoking, daily"]])).toBe('id,name\r\nn1,"Smoking, daily"\r\n');
  });
});

describe("exportModel", () => {
  let exportsPath: string;
  let service: CausalModelService;
  const context = requestContextService.createRequestContext({ operation: "exportTest" });

  beforeEach(() => {
    exportsPath = mkdtempSync(path.join(tmpdir(), "model-export-"));
    service = new CausalModelService({ dbPath: ":memory:", exportsPath, sampleSize: 10, maxParents: 12 });
    service.addNode({ nodeId: "smoking", name: "Smoking" });
    service.addNode({ nodeId: "cough", keywords: "symptom respiratory" });
    service.addReference({ refId: "doe2019", title: "Tobacco, and cough", authors: ["Doe, Jane", "Roe, Rick"], year: "2019" });
    service.addLink({ ...link("L1", "smoking", "cough", 0.9, 0.6, 0.7, "doe2019"), m1Memo: "peer reviewed" });
  });

  afterEach(() => {
    service.close();
    rmSync(exportsPath, { recursive: true, force: true });
  });

  it("writes every table, the references as RIS, the graph and the database", async () => {
    const summary = await service.exportModel("run-1", context);
    const directory = path.join(exportsPath, "run-1");
    const read = (file: string) => readFileSync(path.join(directory, file), "utf-8");

    expect(summary).toEqual({
      directory,
      files: ["nodes.csv", "links.csv", "references.csv", "references.ris", "model.dot", "causal-model.sqlite"],
      nodeCount: 2,
      linkCount: 1,
      referenceCount: 1,
    });
    expect(readdirSync(directory).sort()).toEqual([
      "causal-model.sqlite",
      "links.csv",
      "model.dot",
      "nodes.csv",
      "references.csv",
      "references.ris",
    ]);
    expect(read("nodes.csv")).toBe("node_id,name,keywords\r\ncough,,symptom respiratory\r\nsmoking,Smoking,\r\n");
    expect(read("links.csv").split("\r\n")[1]).toBe(
      "L1,smoking,cough,UNIFORM,0.9,0.9,UNIFORM,0.6,0.6,UNIFORM,0.7,0.7,peer reviewed,,,doe2019,0",
    );
    expect(read("references.csv")).toBe(
      'ref_id,title,authors,year,publication_type,publisher\r\ndoe2019,"Tobacco, and cough","Doe, Jane; Roe, Rick",2019,,\r\n',
    );
    expect(read("references.ris")).toBe(
      "TY  - GEN\nID  - doe2019\nTI  - Tobacco, and cough\nAU  - Doe, Jane\nAU  - Roe, Rick\nPY  - 2019\nER  - \n",
    );
    expect(read("model.dot")).toBe(service.toDot());

    const copy = new ModelStore(path.join(directory, "causal-model.sqlite"));
    expect(copy.linkIds()).toEqual(["L1"]);
    copy.close();
  });

  it("rejects a directory outside the exports directory", async () => {
    await expect(service.exportModel("../escape", context)).rejects.toMatchObject({ code: "VALIDATION_ERROR" });
  });
});
