// Evaluation Harness - drives one tuple through pre-process, query, post-process and scoring
//
// PENDING -> PREPROCESSED -> QUERIED -> POSTPROCESSED -> SCORED
// Any request error moves the tuple to FAILED and is recorded on the result;
// evaluate() never throws for client errors.
import { EVAL_CONFIG } from "./config";
import { majorityAnswer, pickListItem, truncateWords } from "./postprocess";
import { scoreAnswer } from "./scoring";
import { RequestClient, isRequestError } from "~~/services/llm";
import {
  buildConsolidationPrompt,
  buildPreprocessPrompt,
  buildQueryPrompt,
  expectedAnswerLength,
  extractResult,
} from "~~/services/prompts";
import { EvaluationResult, EvaluationTuple, TupleState } from "~~/types/benchmark";

export type HarnessOptions = {
  client: RequestClient;
  modelId: string;
  correctnessThreshold?: number;
  selfConsistencySamples?: number;
  /** Seed for k-shot exemplar selection */
  seed?: number;
};

/** Per-tuple request accounting */
type TupleRun = {
  state: TupleState;
  calls: number;
  retries: number;
};

type SelfConsistencyOutcome = {
  /** Every sample, plus the consolidation when one was needed */
  raw: string;
  /** Majority sample or consolidated answer */
  answer: string;
};

export class EvaluationHarness {
  private readonly threshold: number;
  private readonly samples: number;

  constructor(private readonly options: HarnessOptions) {
    this.threshold = options.correctnessThreshold ?? EVAL_CONFIG.correctnessThreshold;
    this.samples = options.selfConsistencySamples ?? EVAL_CONFIG.selfConsistencySamples;
  }

  async evaluate(tuple: EvaluationTuple): Promise<EvaluationResult> {
    const start = Date.now();
    const run: TupleRun = { state: "PENDING", calls: 0, retries: 0 };
    let rawResponse = "";

    try {
      const question = await this.preprocess(tuple, run);
      run.state = "PREPROCESSED";

      const prompt = buildQueryPrompt({
        question,
        datasetName: tuple.datasetName,
        inproc: tuple.inproc,
        postproc: tuple.postproc,
        seed: this.options.seed,
      });

      let answerText: string;
      if (tuple.postproc === "self_consistency") {
        const consistent = await this.selfConsistency(prompt, tuple.temperature, run);
        rawResponse = consistent.raw;
        answerText = consistent.answer;
      } else {
        rawResponse = await this.send(prompt, tuple.temperature, run);
        answerText = rawResponse;
      }
      run.state = "QUERIED";

      const processedAnswer = this.postprocess(tuple, answerText);
      run.state = "POSTPROCESSED";

      const { isCorrect, rougeL, bleu } = scoreAnswer(processedAnswer, tuple.referenceAnswer, this.threshold);

      const result: EvaluationResult = {
        tuple,
        status: "SCORED",
        rawResponse,
        processedAnswer,
        isCorrect,
        latencyMs: Date.now() - start,
        retriesUsed: run.retries,
        callsUsed: run.calls,
        scores: { rougeL, bleu },
      };
      return Object.freeze(result);
    } catch (error) {
      if (!isRequestError(error)) throw error;

      const result: EvaluationResult = {
        tuple,
        status: "FAILED",
        rawResponse,
        processedAnswer: "",
        isCorrect: false,
        latencyMs: Date.now() - start,
        retriesUsed: run.retries,
        callsUsed: run.calls,
        scores: null,
        failure: { state: run.state, kind: error.kind, message: error.message },
      };
      return Object.freeze(result);
    }
  }

  private async send(prompt: string, temperature: number, run: TupleRun): Promise<string> {
    run.calls++;
    try {
      const completion = await this.options.client.complete(prompt, this.options.modelId, temperature);
      run.retries += completion.attempts - 1;
      return completion.text;
    } catch (error) {
      if (isRequestError(error)) run.retries += error.attempts - 1;
      throw error;
    }
  }

  private async preprocess(tuple: EvaluationTuple, run: TupleRun): Promise<string> {
    if (tuple.preproc === "none") return tuple.question;

    const response = await this.send(buildPreprocessPrompt(tuple.preproc, tuple.question), 0, run);
    return extractResult(response) || tuple.question;
  }

  /**
   * Draw N samples at the sampling temperature and keep the majority answer.
   * Without a majority, the samples are consolidated by one more request.
   * `raw` keeps every sample (and the consolidation) verbatim.
   */
  private async selfConsistency(prompt: string, temperature: number, run: TupleRun): Promise<SelfConsistencyOutcome> {
    const responses: string[] = [];
    for (let i = 0; i < this.samples; i++) {
      responses.push(await this.send(prompt, EVAL_CONFIG.selfConsistencyTemperature, run));
    }
    const sections = responses.map((response, index) => `Sample ${index + 1}:\n${response}`);

    const answers = responses.map(extractResult);
    const majority = majorityAnswer(answers);
    if (majority !== null) return { raw: sections.join("\n\n"), answer: majority };

    const consolidated = await this.send(buildConsolidationPrompt(answers), temperature, run);
    return { raw: [...sections, `Consolidated:\n${consolidated}`].join("\n\n"), answer: consolidated };
  }

  private postprocess(tuple: EvaluationTuple, answerText: string): string {
    const answer = extractResult(answerText);

    switch (tuple.postproc) {
      case "list1":
        return pickListItem(answer, 0);
      case "list2":
        return pickListItem(answer, 1);
      case "length":
        return truncateWords(answer, expectedAnswerLength(tuple.datasetName));
      case "none":
      case "self_consistency":
        return answer;
    }
  }
}
