import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ModelStore } from "../../../src/services/causalModel/index.js";
import { BaseErrorCode } from "../../../src/types-global/errors.js";
import { ErrorHandler } from "../../../src/utils/index.js";
import { link } from "./fixtures.js";

describe("ModelStore", () => {
  let store: ModelStore;

  beforeEach(() => {
    store = new ModelStore(":memory:");
    store.addNode({ nodeId: "smoking", name: "Smoking", keywords: "tobacco habit" });
    store.addNode({ nodeId: "cough" });
    store.addReference({ refId: "doe2019", title: "Main title", authors: ["Doe, Jane"], year: "2019" });
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips nodes, links and references", () => {
    store.addLink({ ...link("L1", "smoking", "cough", 0.9, 0.6, 0.7, "doe2019"), m2Memo: "cohort study", edgeKey: 0 });

    expect(store.getNode("smoking")).toEqual({ nodeId: "smoking", name: "Smoking", keywords: "tobacco habit" });
    expect(store.getReference("doe2019")).toEqual({
      refId: "doe2019",
      title: "Main title",
      authors: ["Doe, Jane"],
      year: "2019",
    });
    expect(store.getLink("L1")).toEqual({
      ...link("L1", "smoking", "cough", 0.9, 0.6, 0.7, "doe2019"),
      m2Memo: "cohort study",
      edgeKey: 0,
    });
    expect(store.getNode("missing")).toBeUndefined();
  });

  it("lists ids in sorted order", () => {
    store.addNode({ nodeId: "asthma" });

    expect(store.nodeIds()).toEqual(["asthma", "cough", "smoking"]);
    expect(store.referenceIds()).toEqual(["doe2019"]);
  });

  it("removes the links of a removed node", () => {
    store.addLink({ ...link("L1", "smoking", "cough"), edgeKey: 0 });
    store.addLink({ ...link("L2", "smoking", "cough"), edgeKey: 1 });

    expect(store.removeNode("cough")).toEqual(["L1", "L2"]);
    expect(store.linkIds()).toEqual([]);
    expect(store.nodeIds()).toEqual(["smoking"]);
  });

  it("removes the links citing a removed reference", () => {
    store.addLink({ ...link("L1", "smoking", "cough", 1, 0.5, 1, "doe2019"), edgeKey: 0 });
    store.addLink({ ...link("L2", "smoking", "cough"), edgeKey: 1 });

    expect(store.removeReference("doe2019")).toEqual(["L1"]);
    expect(store.linkIds()).toEqual(["L2"]);
  });

  it("enforces keys through SQLite constraints", () => {
    const duplicate = () => store.addNode({ nodeId: "smoking" });
    const dangling = () => store.addLink({ ...link("L9", "smoking", "nowhere"), edgeKey: 0 });

    expect(duplicate).toThrow();
    expect(dangling).toThrow();
    try {
      duplicate();
    } catch (error) {
      expect(ErrorHandler.determineErrorCode(error)).toBe(BaseErrorCode.CONFLICT);
    }
    try {
      dangling();
    } catch (error) {
      expect(ErrorHandler.determineErrorCode(error)).toBe(BaseErrorCode.NOT_FOUND);
    }
  });

  it("inserts a batch of references all or none", () => {
    expect(() =>
      store.addReferences([
        { refId: "new1", title: "New" },
        { refId: "doe2019", title: "Clash" },
      ]),
    ).toThrow();
    expect(store.referenceIds()).toEqual(["doe2019"]);
  });

  it("clears every table", () => {
    store.addLink({ ...link("L1", "smoking", "cough"), edgeKey: 0 });
    store.clear();

    expect(store.nodeIds()).toEqual([]);
    expect(store.linkIds()).toEqual([]);
    expect(store.referenceIds()).toEqual([]);
    store.addNode({ nodeId: "again" });
    expect(store.nodeIds()).toEqual(["again"]);
  });
});

describe("ModelStore on disk", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(path.join(tmpdir(), "model-store-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("keeps data across reopening and creates missing directories", () => {
    const filePath = path.join(directory, "nested", "model.sqlite");
    const first = new ModelStore(filePath);
    first.addNode({ nodeId: "smoking" });
    first.close();

    const second = new ModelStore(filePath);
    expect(second.nodeIds()).toEqual(["smoking"]);
    second.close();
  });
});
