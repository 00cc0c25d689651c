import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CausalModelService } from "../../../src/services/causalModel/index.js";
import { BaseErrorCode, McpError } from "../../../src/types-global/errors.js";
import { requestContextService } from "../../../src/utils/index.js";
import { link } from "./fixtures.js";

const context = requestContextService.createRequestContext({ operation: "causalModelServiceTest" });

const errorCodeOf = (fn: () => unknown): BaseErrorCode | undefined => {
  try {
    fn();
  } catch (error) {
    return error instanceof McpError ? error.code : undefined;
  }
  throw new Error("expected the call to throw");
};

const TWO_RECORDS = [
  "TY  - JOUR",
  "ID  - doe2019",
  "TI  - Tobacco use and chronic cough",
  "AU  - Doe, Jane",
  "PY  - 2019",
  "ER  - ",
  "",
  "TY  - BOOK",
  "TI  - A book without id",
  "ER  - ",
].join("\n");

describe("CausalModelService", () => {
  let service: CausalModelService;

  beforeEach(() => {
    service = new CausalModelService({
      dbPath: ":memory:",
      exportsPath: "/tmp/causal-model-exports",
      sampleSize: 10,
      maxParents: 12,
      randomSeed: 1,
    });
    service.addNode({ nodeId: "smoking", name: "Smoking" });
    service.addNode({ nodeId: "cough" });
  });

  afterEach(() => {
    service.close();
  });

  describe("nodes", () => {
    it("rejects a duplicate node id", () => {
      expect(errorCodeOf(() => service.addNode({ nodeId: "smoking" }))).toBe(BaseErrorCode.CONFLICT);
    });

    it("reports a missing node", () => {
      expect(errorCodeOf(() => service.getNode("asthma"))).toBe(BaseErrorCode.NOT_FOUND);
      expect(errorCodeOf(() => service.removeNode("asthma"))).toBe(BaseErrorCode.NOT_FOUND);
    });

    it("keeps node, link and reference ids in separate namespaces", () => {
      service.addReference({ refId: "smoking", title: "About smoking" });
      service.addLink(link("smoking", "smoking", "cough"));

      expect(service.summary()).toEqual({ nodes: ["cough", "smoking"], links: ["smoking"], references: ["smoking"] });
    });

    it("removes a node together with its links", () => {
      service.addLink(link("L1", "smoking", "cough"));

      expect(service.removeNode("smoking")).toEqual(["L1"]);
      expect(service.links()).toEqual([]);
      expect(service.predecessors("cough")).toEqual([]);
    });
  });

  describe("links", () => {
    it("assigns increasing edge keys to parallel links", () => {
      const first = service.addLink(link("L1", "smoking", "cough"));
      const second = service.addLink(link("L2", "smoking", "cough"));

      expect([first.edgeKey, second.edgeKey]).toEqual([0, 1]);
      expect(service.linksBetween("smoking", "cough").map((l) => l.linkId)).toEqual(["L1", "L2"]);
      expect(service.getLink("L2")).toEqual(second);
    });

    it("rejects duplicate ids, self links, missing endpoints and unknown references", () => {
      service.addLink(link("L1", "smoking", "cough"));

      expect(errorCodeOf(() => service.addLink(link("L1", "cough", "smoking")))).toBe(BaseErrorCode.CONFLICT);
      expect(errorCodeOf(() => service.addLink(link("L2", "cough", "cough")))).toBe(BaseErrorCode.VALIDATION_ERROR);
      expect(errorCodeOf(() => service.addLink(link("L3", "asthma", "cough")))).toBe(BaseErrorCode.NOT_FOUND);
      expect(errorCodeOf(() => service.addLink(link("L4", "smoking", "asthma")))).toBe(BaseErrorCode.NOT_FOUND);
      expect(errorCodeOf(() => service.addLink(link("L5", "smoking", "cough", 1, 0.5, 1, "nope")))).toBe(
        BaseErrorCode.NOT_FOUND,
      );
      expect(service.links()).toEqual(["L1"]);
    });

    it("rejects an estimate whose lower bound exceeds its upper bound", () => {
      expect(() =>
        service.addLink({ ...link("L1", "smoking", "cough"), m1: { type: "UNIFORM", a: 0.8, b: 0.2 } }),
      ).toThrow("must not exceed");
    });

    it("removes a link from the store and the graph", () => {
      service.addLink(link("L1", "smoking", "cough"));
      service.removeLink("L1");

      expect(service.links()).toEqual([]);
      expect(service.predecessors("cough")).toEqual([]);
      expect(errorCodeOf(() => service.removeLink("L1"))).toBe(BaseErrorCode.NOT_FOUND);
    });
  });

  describe("references", () => {
    it("removes the links citing a removed reference", () => {
      service.addReference({ refId: "doe2019", title: "Main title" });
      service.addLink(link("L1", "smoking", "cough", 1, 0.5, 1, "doe2019"));
      service.addLink(link("L2", "smoking", "cough"));

      expect(service.removeReference("doe2019")).toEqual(["L1"]);
      expect(service.linksBetween("smoking", "cough").map((l) => l.linkId)).toEqual(["L2"]);
    });

    it("imports RIS records using their ID tag or a generated id", () => {
      service.addReference({ refId: "ref-1", title: "Existing" });

      const { references, warnings } = service.importRis(TWO_RECORDS, undefined, context);

      expect(references.map((reference) => reference.refId)).toEqual(["doe2019", "ref-2"]);
      expect(warnings).toEqual([]);
      expect(service.getReference("doe2019")).toMatchObject({
        title: "Tobacco use and chronic cough",
        authors: ["Doe, Jane"],
        year: "2019",
        publicationType: "JOUR",
      });
      expect(service.references()).toEqual(["doe2019", "ref-1", "ref-2"]);
    });

    it("uses explicit ids when given and requires one per record", () => {
      expect(errorCodeOf(() => service.importRis(TWO_RECORDS, ["only-one"], context))).toBe(
        BaseErrorCode.VALIDATION_ERROR,
      );

      service.importRis(TWO_RECORDS, ["a", "b"], context);
      expect(service.references()).toEqual(["a", "b"]);
    });

    it("imports nothing when any record fails", () => {
      service.addReference({ refId: "b", title: "Taken" });

      expect(errorCodeOf(() => service.importRis(TWO_RECORDS, ["a", "b"], context))).toBe(BaseErrorCode.CONFLICT);
      expect(
        errorCodeOf(() => service.importRis("TY  - JOUR\nTI  - Ok\nER  - \nTY  - JOUR\nAU  - No, Title\nER  - ", undefined, context)),
      ).toBe(BaseErrorCode.VALIDATION_ERROR);
      expect(errorCodeOf(() => service.importRis("TY  - JOUR\nTI  - Unterminated", undefined, context))).toBe(
        BaseErrorCode.VALIDATION_ERROR,
      );
      expect(service.references()).toEqual(["b"]);
    });

    it("keeps generated ids clear of ids claimed later in the same file", () => {
      const text = "TY  - JOUR\nTI  - First, no id\nER  - \n\nTY  - JOUR\nID  - ref-1\nTI  - Second\nER  - ";

      const { references } = service.importRis(text, undefined, context);

      expect(references.map((reference) => [reference.refId, reference.title])).toEqual([
        ["ref-2", "First, no id"],
        ["ref-1", "Second"],
      ]);
      expect(service.references()).toEqual(["ref-1", "ref-2"]);
    });

    it("rejects two records claiming the same ID", () => {
      const text = "TY  - JOUR\nID  - same\nTI  - One\nER  - \nTY  - JOUR\nID  - same\nTI  - Two\nER  - ";

      expect(errorCodeOf(() => service.importRis(text, undefined, context))).toBe(BaseErrorCode.CONFLICT);
      expect(service.references()).toEqual([]);
    });

    it("returns RIS warnings with the imported references", () => {
      const { warnings } = service.importRis("TY  - JOUR\nTI  - Title\nZZ  - custom\nER  - ", undefined, context);

      expect(warnings.map((warning) => [warning.code, warning.line])).toEqual([["UNKNOWN_TAG", 3]]);
    });
  });

  describe("model", () => {
    it("renders the graph as DOT", () => {
      service.addLink(link("L1", "smoking", "cough"));

      expect(service.toDot()).toContain('"smoking" -> "cough" [id="L1", key=0];');
    });

    it("clears every element", () => {
      service.addReference({ refId: "doe2019", title: "Main title" });
      service.addLink(link("L1", "smoking", "cough"));
      service.clear();

      expect(service.summary()).toEqual({ nodes: [], links: [], references: [] });
      expect(service.toDot()).toBe('digraph "causal_model" {\n}\n');
    });

    it("confines export paths to the exports directory", () => {
      expect(service.resolveExportPath("run-1")).toBe("/tmp/causal-model-exports/run-1");
      expect(errorCodeOf(() => service.resolveExportPath("../outside"))).toBe(BaseErrorCode.VALIDATION_ERROR);
    });
  });
});

describe("CausalModelService on a database file", () => {
  let directory: string;

  const open = (): CausalModelService =>
    new CausalModelService({
      dbPath: path.join(directory, "model.sqlite"),
      exportsPath: path.join(directory, "exports"),
      sampleSize: 10,
      maxParents: 12,
      randomSeed: 1,
    });

  beforeEach(() => {
    directory = mkdtempSync(path.join(tmpdir(), "causal-model-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("rebuilds the graph from stored links when reopened", () => {
    const first = open();
    first.addNode({ nodeId: "smoking" });
    first.addNode({ nodeId: "cough" });
    first.addLink(link("Lb", "smoking", "cough", 1, 0.2, 1));
    first.addLink(link("La", "smoking", "cough", 1, 0.6, 1));
    first.close();

    const reopened = open();
    try {
      expect(reopened.predecessors("cough")).toEqual(["smoking"]);
      expect(reopened.linksBetween("smoking", "cough").map((l) => [l.linkId, l.edgeKey])).toEqual([
        ["Lb", 0],
        ["La", 1],
      ]);

      const result = reopened.quantify("cough", "ARITHMETIC");
      expect(result.linkWeights.map((w) => w.linkId)).toEqual(["Lb", "La"]);
      expect(result.conditionalProbabilities[0]?.probability.mean).toBeCloseTo(0.4, 10);

      expect(reopened.addLink(link("Lc", "smoking", "cough")).edgeKey).toBe(2);
    } finally {
      reopened.close();
    }
  });
});
