// Filter Stage - keep/discard classification of a QA pair for one criterion
import { RequestClient } from "~~/services/llm";
import { buildFilterPrompt } from "~~/services/prompts";
import { FilterName, FilterVerdict, QARecord } from "~~/types/benchmark";

/** Verdict applied when a response cannot be parsed */
export type ParseFailurePolicy = "keep" | "discard";

export type ParsedVerdict = {
  kept: boolean;
  rationale: string;
};

const RESULT_TAG = /<result>\s*([^<]*?)\s*<\/result>/gi;
const KEEP_ANSWERS = new Set(["1", "keep", "yes"]);
const DISCARD_ANSWERS = new Set(["0", "discard", "no"]);

function parseLabel(label: string): boolean | null {
  const normalized = label
    .trim()
    .toLowerCase()
    .replace(/[.!"'`*]/g, "")
    .trim();
  if (KEEP_ANSWERS.has(normalized)) return true;
  if (DISCARD_ANSWERS.has(normalized)) return false;
  return null;
}

/**
 * Parse a filter response: the last <result>0|1</result> tag wins; a bare
 * 1/0, keep/discard or yes/no answer is accepted too. Returns null when
 * neither form is found.
 */
export function parseVerdict(response: string): ParsedVerdict | null {
  const matches = [...response.matchAll(RESULT_TAG)];
  const last = matches[matches.length - 1];

  if (last) {
    const kept = parseLabel(last[1]);
    if (kept === null) return null;
    const rationale = response
      .slice(0, last.index)
      .trim()
      .replace(/^reason:\s*/i, "");
    return { kept, rationale };
  }

  const kept = parseLabel(response);
  return kept === null ? null : { kept, rationale: "" };
}

export type FilterClassifierOptions = {
  client: RequestClient;
  modelId: string;
  parseFailurePolicy?: ParseFailurePolicy;
  /** Completion budget; reasoning models need room for their trace */
  maxTokens?: number;
  log?: (message: string) => void;
};

export class FilterClassifier {
  private readonly policy: ParseFailurePolicy;
  private readonly log: (message: string) => void;

  constructor(private readonly options: FilterClassifierOptions) {
    this.policy = options.parseFailurePolicy ?? "discard";
    this.log = options.log ?? (message => console.log(message));
  }

  /**
   * Classify one record for one filter at temperature 0.
   * Client failures propagate as RequestError.
   */
  async classify(record: QARecord, filterName: FilterName): Promise<FilterVerdict> {
    const prompt = buildFilterPrompt(filterName, record);
    const response = await this.options.client.send(prompt, this.options.modelId, 0, {
      maxTokens: this.options.maxTokens,
    });

    const parsed = parseVerdict(response);
    if (!parsed) {
      this.log(`  ${filterName}: unparseable response, applying "${this.policy}" policy`);
      return { recordId: record.id, filterName, kept: this.policy === "keep", rationale: response };
    }

    return {
      recordId: record.id,
      filterName,
      kept: parsed.kept,
      ...(parsed.rationale ? { rationale: parsed.rationale } : {}),
    };
  }
}
