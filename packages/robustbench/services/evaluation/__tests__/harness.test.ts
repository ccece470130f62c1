import { EvaluationHarness } from "../harness";
import { describe, expect, it } from "vitest";
import { Responder, createTestClient, httpError } from "~~/test/fakes";
import { EvaluationTuple } from "~~/types/benchmark";

const COT =
  "Let's think step by step. Any constraints given apply only to the final answer, not to the reasoning steps. Place the final answer within <result> and </result> tags.";

function makeTuple(overrides: Partial<EvaluationTuple> = {}): EvaluationTuple {
  return {
    recordId: "1",
    perturbationType: "none",
    datasetName: "squad2",
    preproc: "none",
    inproc: "none",
    postproc: "none",
    temperature: 0,
    question: "Why did the bridge collapse?",
    referenceAnswer: "metal fatigue",
    ...overrides,
  };
}

function makeHarness(respond: Responder) {
  const test = createTestClient(respond);
  const harness = new EvaluationHarness({ client: test.client, modelId: "test-model", selfConsistencySamples: 3 });
  return { harness, ...test };
}

describe("EvaluationHarness", () => {
  it("scores a chain-of-thought answer with a list constraint", async () => {
    const { harness, transport } = makeHarness(() => "Because of metal fatigue.");

    const result = await harness.evaluate(makeTuple({ inproc: "cot", postproc: "list1" }));

    expect(result.status).toBe("SCORED");
    expect(result.processedAnswer).toBe("Because of metal fatigue.");
    expect(result.isCorrect).toBe(true);
    expect(result.callsUsed).toBe(1);
    expect(result.retriesUsed).toBe(0);
    expect(result.failure).toBeUndefined();

    expect(transport.requests).toHaveLength(1);
    const [request] = transport.requests;
    expect(request.model).toBe("test-model");
    expect(request.temperature).toBe(0);
    expect(request.prompt.startsWith("Constraint: Output only a comma-separated list")).toBe(true);
    expect(request.prompt.endsWith(`\nQuestion: Why did the bridge collapse?\n${COT}`)).toBe(true);
  });

  it("extracts the tagged answer and keeps the raw response", async () => {
    const { harness } = makeHarness(() => "Thinking it over.\n<result>rust</result>");

    const result = await harness.evaluate(makeTuple());

    expect(result.rawResponse).toBe("Thinking it over.\n<result>rust</result>");
    expect(result.processedAnswer).toBe("rust");
    expect(result.isCorrect).toBe(false);
    expect(result.scores).toEqual({ rougeL: 0, bleu: 0 });
  });

  it("truncates answers to the dataset's expected length", async () => {
    const { harness, transport } = makeHarness(() => "It failed from metal fatigue in the main cables");

    const result = await harness.evaluate(makeTuple({ postproc: "length" }));

    expect(transport.requests[0].prompt).toBe(
      "Constraint: Answer the question using 6 words.\nQuestion: Why did the bridge collapse?",
    );
    expect(result.processedAnswer).toBe("It failed from metal fatigue in");
  });

  it("counts retries of a request", async () => {
    const { harness } = makeHarness((_request, index) => {
      if (index === 0) throw httpError(503);
      return "metal fatigue";
    });

    const result = await harness.evaluate(makeTuple());

    expect(result.status).toBe("SCORED");
    expect(result.callsUsed).toBe(1);
    expect(result.retriesUsed).toBe(1);
  });

  it("pre-processes the question with one extra request", async () => {
    const { harness, transport } = makeHarness(request =>
      request.prompt.includes("Correct all spelling mistakes")
        ? "<result>Why did the bridge collapse?</result>"
        : "metal fatigue",
    );

    const result = await harness.evaluate(makeTuple({ preproc: "correct", question: "Why did teh bridge colapse?" }));

    expect(result.callsUsed).toBe(2);
    expect(transport.requests[0].temperature).toBe(0);
    expect(transport.requests[1].prompt).toBe("Why did the bridge collapse?");
    expect(result.tuple.question).toBe("Why did teh bridge colapse?");
  });

  describe("self-consistency", () => {
    it("keeps the majority of the samples", async () => {
      const samples = ["<result>Metal fatigue.</result>", "<result>rust</result>", "<result>metal fatigue</result>"];
      const { harness, transport } = makeHarness((_request, index) => samples[index]);

      const result = await harness.evaluate(makeTuple({ postproc: "self_consistency" }));

      expect(result.callsUsed).toBe(3);
      expect(transport.requests.map(request => request.temperature)).toEqual([1, 1, 1]);
      expect(result.processedAnswer).toBe("Metal fatigue.");
      expect(result.isCorrect).toBe(true);
      expect(result.rawResponse).toBe(
        "Sample 1:\n<result>Metal fatigue.</result>\n\nSample 2:\n<result>rust</result>\n\nSample 3:\n<result>metal fatigue</result>",
      );
    });

    it("consolidates the samples when there is no majority", async () => {
      const responses = ["ice", "rust", "wind", "<result>metal fatigue</result>"];
      const { harness, transport } = makeHarness((_request, index) => responses[index]);

      const result = await harness.evaluate(makeTuple({ postproc: "self_consistency", temperature: 0.7 }));

      expect(result.callsUsed).toBe(4);
      const consolidation = transport.requests[3];
      expect(consolidation.temperature).toBe(0.7);
      expect(consolidation.prompt.startsWith("Below are 3 answers generated independently.")).toBe(true);
      expect(consolidation.prompt).toContain("Answer 1:\nice\n\nAnswer 2:\nrust\n\nAnswer 3:\nwind");
      expect(result.processedAnswer).toBe("metal fatigue");
      expect(result.rawResponse).toBe(
        "Sample 1:\nice\n\nSample 2:\nrust\n\nSample 3:\nwind\n\nConsolidated:\n<result>metal fatigue</result>",
      );
    });
  });

  describe("failures", () => {
    it("records the state reached before an exhausted query", async () => {
      const { harness } = makeHarness(() => {
        throw httpError(503, "Service Unavailable");
      });

      const result = await harness.evaluate(makeTuple());

      expect(result.status).toBe("FAILED");
      expect(result.processedAnswer).toBe("");
      expect(result.isCorrect).toBe(false);
      expect(result.scores).toBeNull();
      expect(result.callsUsed).toBe(1);
      expect(result.retriesUsed).toBe(2);
      expect(result.failure?.state).toBe("PREPROCESSED");
      expect(result.failure?.kind).toBe("Exhausted");
    });

    it("fails in PENDING when pre-processing is rejected", async () => {
      const { harness, transport } = makeHarness(() => {
        throw httpError(401, "Unauthorized");
      });

      const result = await harness.evaluate(makeTuple({ preproc: "correct" }));

      expect(transport.requests).toHaveLength(1);
      expect(result.status).toBe("FAILED");
      expect(result.failure?.state).toBe("PENDING");
      expect(result.failure?.kind).toBe("Invalid");
    });
  });
});
