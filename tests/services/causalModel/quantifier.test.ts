import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CausalModelService,
  combinations,
} from "../../../src/services/causalModel/index.js";
import { BaseErrorCode, McpError } from "../../../src/types-global/errors.js";
import { link } from "./fixtures.js";

const openService = (maxParents = 12): CausalModelService =>
  new CausalModelService({
    dbPath: ":memory:",
    exportsPath: tmpdir(),
    sampleSize: 10,
    maxParents,
    randomSeed: 5,
  });

describe("combinations", () => {
  it("lists subsets in lexicographic order", () => {
    expect(combinations(["a", "b", "c"], 2)).toEqual([
      ["a", "b"],
      ["a", "c"],
      ["b", "c"],
    ]);
    expect(combinations(["a", "b"], 3)).toEqual([]);
  });
});

describe("Quantifier", () => {
  let service: CausalModelService;

  beforeEach(() => {
    service = openService();
    ["smoking", "pollution", "cough"].forEach((nodeId) => service.addNode({ nodeId }));
    // smoking -> cough twice: m1*m3 of 0.8 and 0.2, so weights 0.8 and 0.2.
    service.addLink(link("L1", "smoking", "cough", 0.8, 0.5, 1));
    service.addLink(link("L2", "smoking", "cough", 0.4, 0.9, 0.5));
    service.addLink(link("L3", "pollution", "cough", 1, 0.6, 1));
  });

  afterEach(() => {
    service.close();
  });

  it("weights parallel links by m1*m3 and aggregates arithmetically", () => {
    const result = service.quantify("cough", "ARITHMETIC");

    expect(result.parents).toEqual(["pollution", "smoking"]);
    expect(result.sampleSize).toBe(10);
    expect(result.linkWeights.map((w) => [w.linkId, w.edgeKey])).toEqual([
      ["L3", 0],
      ["L1", 0],
      ["L2", 1],
    ]);
    expect(result.linkWeights[1]?.weight.mean).toBeCloseTo(0.8, 10);
    expect(result.linkWeights[2]?.weight.mean).toBeCloseTo(0.2, 10);

    const [pollution, smoking] = result.conditionalProbabilities;
    expect(pollution?.probability.mean).toBeCloseTo(0.6, 10);
    expect(smoking?.probability.mean).toBeCloseTo(0.8 * 0.5 + 0.2 * 0.9, 10);
  });

  it("combines parents by noisy-OR for every parent combination", () => {
    const result = service.quantify("cough", "ARITHMETIC");

    expect(result.conditionalProbabilityTable.map((row) => row.parents)).toEqual([
      ["pollution"],
      ["smoking"],
      ["pollution", "smoking"],
    ]);
    const both = result.conditionalProbabilityTable[2]?.probability;
    expect(both?.mean).toBeCloseTo(1 - (1 - 0.6) * (1 - 0.58), 10);
    expect(both?.p05).toBeCloseTo(0.832, 10);
    expect(both?.p95).toBeCloseTo(0.832, 10);
  });

  it("aggregates parallel links geometrically", () => {
    const result = service.quantify("cough", "GEOMETRIC");

    expect(result.aggregationMethod).toBe("GEOMETRIC");
    expect(result.conditionalProbabilities[1]?.probability.mean).toBeCloseTo(0.5 ** 0.8 * 0.9 ** 0.2, 10);
  });

  it("gives parallel links equal weight when every m1*m3 is zero", () => {
    service.addNode({ nodeId: "wheeze" });
    service.addLink(link("L4", "smoking", "wheeze", 0, 0.2, 1));
    service.addLink(link("L5", "smoking", "wheeze", 0, 0.6, 1));

    const result = service.quantify("wheeze", "ARITHMETIC");

    expect(result.linkWeights.map((w) => w.weight.mean)).toEqual([0.5, 0.5]);
    expect(result.conditionalProbabilities[0]?.probability.mean).toBeCloseTo(0.4, 10);
  });

  it("returns an empty table for a node without parents", () => {
    const result = service.quantify("smoking", "ARITHMETIC");

    expect(result.parents).toEqual([]);
    expect(result.conditionalProbabilityTable).toEqual([]);
  });

  it("rejects unknown nodes and nodes with too many parents", () => {
    expect(() => service.createQuantifier("asthma")).toThrow(McpError);

    const limited = openService(1);
    ["a", "b", "c"].forEach((nodeId) => limited.addNode({ nodeId }));
    limited.addLink(link("La", "a", "c"));
    limited.addLink(link("Lb", "b", "c"));
    try {
      limited.createQuantifier("c");
      expect.unreachable();
    } catch (error) {
      expect(error instanceof McpError ? error.code : undefined).toBe(BaseErrorCode.VALIDATION_ERROR);
    } finally {
      limited.close();
    }
  });

  describe("exportResults", () => {
    let directory: string;

    beforeEach(() => {
      directory = mkdtempSync(path.join(tmpdir(), "quantifier-"));
    });

    afterEach(() => {
      rmSync(directory, { recursive: true, force: true });
    });

    it("fails before calculate has run", async () => {
      const quantifier = service.createQuantifier("cough");

      await expect(quantifier.exportResults(path.join(directory, "cpt.csv"))).rejects.toMatchObject({
        code: BaseErrorCode.INVALID_STATE,
      });
    });

    it("writes the table as CSV", async () => {
      const single = openService();
      single.addNode({ nodeId: "a" });
      single.addNode({ nodeId: "b" });
      single.addLink(link("L1", "a", "b", 1, 0.5, 1));
      const quantifier = single.createQuantifier("b");
      quantifier.calculate("ARITHMETIC");
      const target = path.join(directory, "cpt.csv");

      await quantifier.exportResults(target);

      expect(readFileSync(target, "utf-8")).toBe("parents,mean,p05,p95\r\na,0.5,0.5,0.5\r\n");
      single.close();
    });
  });
});
