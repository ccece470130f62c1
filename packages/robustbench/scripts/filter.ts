/**
 * CLI script for filtering a QA sample down to high-quality causal questions.
 *
 * Verdicts are appended to a ledger after every record; re-running resumes
 * where the previous run stopped without re-sending any request.
 *
 * Usage:
 *   npm run filter                                         # data/sample.csv -> data/filtered.csv
 *   npm run filter -- --input my-sample.csv --output kept.csv
 *   npm run filter -- --filters causal_chain,question      # Run a subset of the filters, in this order
 *   npm run filter -- --parse-failure keep                 # Keep records whose verdict cannot be parsed
 *   npm run filter -- --model qwq-32b --max-tokens 500     # Reasoning models need a larger completion budget
 */
import { dataPath, formatZodError, loadEnv, optionalNumber, requireLlmConfig, splitList } from "./shared";
import { loadRecords } from "~~/services/dataset";
import { FILTER_CONFIG, FilterClassifier, FilterRunConfigSchema, runFilterChain } from "~~/services/filtering";
import { LLM_CONFIG, cleanupEncoder, createRequestClient, formatUsage } from "~~/services/llm";
import { errorMessage } from "~~/utils/errors";

loadEnv();

function parseArgs(argv: string[]) {
  const raw: Record<string, unknown> = {
    inputPath: dataPath("sample.csv"),
    outputPath: dataPath("filtered.csv"),
    ledgerPath: dataPath("filter-verdicts.csv"),
    modelId: process.env.LLM_MODEL || LLM_CONFIG.defaultModel,
    maxTokens: FILTER_CONFIG.maxTokens,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--input":
        raw.inputPath = argv[++i];
        break;
      case "--output":
        raw.outputPath = argv[++i];
        break;
      case "--ledger":
        raw.ledgerPath = argv[++i];
        break;
      case "--model":
        raw.modelId = argv[++i];
        break;
      case "--filters":
        raw.filters = splitList(argv[++i]);
        break;
      case "--parse-failure":
        raw.parseFailurePolicy = argv[++i];
        break;
      case "--max-tokens":
        raw.maxTokens = optionalNumber(argv[++i]);
        break;
      default:
        console.error(`Unknown argument: ${argv[i]}`);
        process.exit(1);
    }
  }

  const parsed = FilterRunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(`Invalid arguments:\n${formatZodError(parsed.error)}`);
    process.exit(1);
  }
  return parsed.data;
}

async function main() {
  const config = parseArgs(process.argv.slice(2));
  requireLlmConfig();

  console.log("=".repeat(60));
  console.log("  QA Filter Chain");
  console.log("=".repeat(60));
  console.log(`  Input:    ${config.inputPath}`);
  console.log(`  Filters:  ${config.filters.join(" -> ")}`);
  console.log(`  Model:    ${config.modelId}`);
  console.log("");

  const records = loadRecords(config.inputPath);
  const client = createRequestClient();
  await client.verifyModel(config.modelId);
  const classifier = new FilterClassifier({
    client,
    modelId: config.modelId,
    parseFailurePolicy: config.parseFailurePolicy,
    maxTokens: config.maxTokens,
  });

  const summary = await runFilterChain({
    records,
    filters: config.filters,
    classifier,
    ledgerPath: config.ledgerPath,
    outputPath: config.outputPath,
  });

  console.log("");
  console.log("-".repeat(60));
  console.log(`  Kept:       ${summary.kept.length}/${records.length}`);
  console.log(`  Discarded:  ${summary.discarded}`);
  console.log(`  Replayed:   ${summary.replayed} verdicts from the ledger`);
  if (summary.skipped.length > 0) {
    console.log(`  Skipped:    ${summary.skipped.length} (${summary.skipped.join(", ")}), re-run to retry`);
  }
  console.log(formatUsage(client.usage.snapshot()));
  console.log(`\nFiltered table saved to: ${config.outputPath}`);
}

main()
  .then(() => {
    cleanupEncoder();
    process.exit(0);
  })
  .catch(error => {
    console.error(`Fatal error during filtering: ${errorMessage(error)}`);
    process.exit(1);
  });
