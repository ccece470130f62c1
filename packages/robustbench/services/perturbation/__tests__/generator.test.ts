import { PerturbationError, PerturbationGenerator, languageFor } from "../generator";
import { describe, expect, it } from "vitest";
import { perturbationLanguages } from "~~/services/prompts";
import { Responder, createTestClient, httpError } from "~~/test/fakes";

const QUESTION = "Why did the bridge collapse?";

function setup(respond: Responder) {
  const test = createTestClient(respond);
  return { ...test, generator: new PerturbationGenerator({ client: test.client, modelId: "test-model" }) };
}

describe("PerturbationGenerator", () => {
  it("perturbs typos locally without a request", async () => {
    const { generator, transport } = setup(() => "unused");

    const perturbed = await generator.perturb(QUESTION, "typo", 50);

    expect(perturbed).not.toBe(QUESTION);
    expect(transport.requests).toHaveLength(0);
  });

  it("extracts the model's result and drops an echoed label", async () => {
    const { generator } = setup((_, index) =>
      index === 0 ? "<result>Why did the bridge fall down?</result>" : "<result>Question: Why did the span fail?</result>",
    );

    await expect(generator.perturb(QUESTION, "synonym")).resolves.toBe("Why did the bridge fall down?");
    await expect(generator.perturb(QUESTION, "paraphrase", 75)).resolves.toBe("Why did the span fail?");
  });

  it("targets the language picked for the question", async () => {
    const { generator, transport } = setup(() => "<result>Why did the Brücke collapse?</result>");

    await generator.perturb(QUESTION, "language");

    const language = languageFor(QUESTION);
    expect(perturbationLanguages()).toContain(language);
    expect(transport.requests[0].prompt).toContain(`into ${language}.`);
  });

  it("fails with PerturbationError on an empty result", async () => {
    const { generator } = setup(() => "<result>  </result>");

    await expect(generator.perturb(QUESTION, "bias")).rejects.toThrow(PerturbationError);
  });

  it("fails with PerturbationError when the request fails", async () => {
    const { generator } = setup(() => {
      throw httpError(400, "Bad Request");
    });

    const error = await generator.perturb(QUESTION, "sentence-inj", 25).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PerturbationError);
    expect(error).toMatchObject({
      perturbationType: "sentence-inj",
      message: "sentence-inj@25 request failed (Invalid): Bad Request",
    });
  });
});
