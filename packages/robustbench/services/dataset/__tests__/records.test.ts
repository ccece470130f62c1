import { loadPerturbedRecords, loadRecords, openPerturbedTable, writeRecords } from "../records";
import { CsvTable } from "../table";
import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, removeDir } from "~~/test/fakes";
import { ConfigError } from "~~/utils/errors";

describe("QA record tables", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  const write = (name: string, content: string): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  };

  it("loads records and accepts the processed column aliases", () => {
    const filePath = write(
      "sample.csv",
      'id,question_processed,answer_processed,dataset\n1,Why did the bridge collapse?,metal fatigue,squad2\n2,"Why do cats purr, mostly?",contentment,eli5\n',
    );

    expect(loadRecords(filePath)).toEqual([
      { id: "1", datasetName: "squad2", question: "Why did the bridge collapse?", answer: "metal fatigue" },
      { id: "2", datasetName: "eli5", question: "Why do cats purr, mostly?", answer: "contentment" },
    ]);
  });

  it("rejects duplicate ids and unknown datasets with the row number", () => {
    const duplicate = write("dup.csv", "id,dataset,question,answer\n1,squad2,Q?,A\n1,squad2,Q2?,A2\n");
    expect(() => loadRecords(duplicate)).toThrow(ConfigError);
    expect(() => loadRecords(duplicate)).toThrow("row 3: duplicate id");

    const unknown = write("unknown.csv", "id,dataset,question,answer\n1,trivia,Q?,A\n");
    expect(() => loadRecords(unknown)).toThrow('row 2: unknown dataset "trivia"');
  });

  it("writes records that load back unchanged", () => {
    const filePath = path.join(dir, "out", "filtered.csv");
    const records = [{ id: "7", datasetName: "gooaq" as const, question: "Why is ice slippery?", answer: "a thin water layer" }];

    writeRecords(filePath, records);

    expect(fs.readFileSync(filePath, "utf-8")).toBe(
      "id,dataset,question,answer\n7,gooaq,Why is ice slippery?,a thin water layer\n",
    );
    expect(loadRecords(filePath)).toEqual(records);
  });

  it("reads perturbation columns from the perturbed table", () => {
    const filePath = path.join(dir, "perturbed.csv");
    const table = openPerturbedTable(filePath);
    table.upsert({ id: "1", dataset: "squad2", question: "Why did the bridge collapse?", answer: "metal fatigue" });
    table.upsert({ id: "1", typo: "Why did teh bridge collapse?", typo_intensity: "25" });
    table.upsert({ id: "1", bias: "Surely the bridge fell because of wind?" });
    table.save();

    expect(loadPerturbedRecords(filePath)).toEqual([
      {
        record: { id: "1", datasetName: "squad2", question: "Why did the bridge collapse?", answer: "metal fatigue" },
        variants: { typo: "Why did teh bridge collapse?", bias: "Surely the bridge fell because of wind?" },
        perturbations: [
          { recordId: "1", perturbationType: "typo", intensity: 25, perturbedQuestion: "Why did teh bridge collapse?" },
          {
            recordId: "1",
            perturbationType: "bias",
            intensity: null,
            perturbedQuestion: "Surely the bridge fell because of wind?",
          },
        ],
      },
    ]);
  });
});

describe("CsvTable", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("persists rows by key and merges partial updates", () => {
    const filePath = path.join(dir, "ledger.csv");
    const table = CsvTable.open(filePath, ["id", "filter", "kept"], ["id", "filter"]);

    table.upsert({ id: "1", filter: "answer", kept: "1" });
    table.upsert({ id: "1", filter: "question", kept: "0" });
    table.upsert({ id: "1", filter: "answer", note: "checked" });
    table.save();

    const reopened = CsvTable.open(filePath, ["id", "filter", "kept"], ["id", "filter"]);
    expect(reopened.size).toBe(2);
    expect(reopened.columns).toEqual(["id", "filter", "kept", "note"]);
    expect(reopened.get("1|answer")).toEqual({ id: "1", filter: "answer", kept: "1", note: "checked" });
    expect(reopened.get("1|question")).toEqual({ id: "1", filter: "question", kept: "0", note: "" });
  });

  it("rejects key columns that are not table columns", () => {
    expect(() => CsvTable.open(path.join(dir, "t.csv"), ["id"], ["key"])).toThrow(ConfigError);
  });
});
