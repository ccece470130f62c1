/**
 * CLI script for running the robustness evaluation.
 * Reports are always saved to evaluation-reports/ directory.
 *
 * Usage:
 *   npm run evaluate                                          # Full matrix with no processing strategy
 *   npm run evaluate -- --datasets squad2,eli5                # Only these datasets
 *   npm run evaluate -- --perturbations typo,bias             # Only these perturbations (none is always included)
 *   npm run evaluate -- --preproc correct --inproc cot --postproc list1
 *   npm run evaluate -- --temperature 0.7 --limit 50          # First 50 records by id
 *   npm run evaluate -- --output baseline.json --latex        # Also write evaluation-reports/baseline.tex
 *   npm run evaluate -- --retry-failed                        # Re-evaluate tuples that FAILED before
 */
import { PACKAGE_ROOT, dataPath, formatZodError, loadEnv, optionalNumber, requireLlmConfig, splitList } from "./shared";
import { mkdirSync } from "fs";
import { resolve } from "path";
import { EvaluationRunConfigSchema, printReport, runEvaluation, saveLatexTable, saveReport } from "~~/services/evaluation";
import { LLM_CONFIG, cleanupEncoder, createRequestClient } from "~~/services/llm";
import { errorMessage } from "~~/utils/errors";

loadEnv();

/** Directory where all evaluation reports are saved */
const REPORTS_DIR = resolve(PACKAGE_ROOT, "../../evaluation-reports");

function parseArgs(argv: string[]) {
  const raw: Record<string, unknown> = {
    perturbedPath: dataPath("perturbed.csv"),
    ledgerPath: dataPath("results.csv"),
    modelId: process.env.LLM_MODEL || LLM_CONFIG.defaultModel,
  };
  let userOutput: string | undefined;
  let latex = false;

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--input":
        raw.perturbedPath = argv[++i];
        break;
      case "--ledger":
        raw.ledgerPath = argv[++i];
        break;
      case "--model":
        raw.modelId = argv[++i];
        break;
      case "--datasets":
        raw.datasets = splitList(argv[++i]);
        break;
      case "--perturbations":
        raw.perturbations = splitList(argv[++i]);
        break;
      case "--preproc":
        raw.preproc = argv[++i];
        break;
      case "--inproc":
        raw.inproc = argv[++i];
        break;
      case "--postproc":
        raw.postproc = argv[++i];
        break;
      case "--temperature":
        raw.temperature = optionalNumber(argv[++i]);
        break;
      case "--limit":
        raw.questionLimit = optionalNumber(argv[++i]);
        break;
      case "--seed":
        raw.seed = optionalNumber(argv[++i]);
        break;
      case "--threshold":
        raw.correctnessThreshold = optionalNumber(argv[++i]);
        break;
      case "--samples":
        raw.selfConsistencySamples = optionalNumber(argv[++i]);
        break;
      case "--retry-failed":
        raw.retryFailed = true;
        break;
      case "--output":
        userOutput = argv[++i];
        break;
      case "--latex":
        latex = true;
        break;
      default:
        console.error(`Unknown argument: ${argv[i]}`);
        process.exit(1);
    }
  }

  const parsed = EvaluationRunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(`Invalid arguments:\n${formatZodError(parsed.error)}`);
    process.exit(1);
  }

  // Always save to evaluation-reports/, under the given name or a timestamped one
  const filename = userOutput || `eval-${new Date().toISOString().replace(/[:.]/g, "-")}.json`;
  const outputPath = resolve(REPORTS_DIR, filename);
  const latexPath = latex ? outputPath.replace(/\.json$/, "") + ".tex" : undefined;

  return { config: parsed.data, outputPath, latexPath };
}

async function main() {
  const { config, outputPath, latexPath } = parseArgs(process.argv.slice(2));
  requireLlmConfig();

  // Ensure the reports directory exists
  mkdirSync(REPORTS_DIR, { recursive: true });

  console.log("=".repeat(60));
  console.log("  Robustness Evaluation Pipeline");
  console.log("=".repeat(60));

  const client = createRequestClient();
  await client.verifyModel(config.modelId);

  const report = await runEvaluation(config, { client });

  printReport(report);
  await saveReport(report, outputPath);
  if (latexPath) await saveLatexTable(report.robustness, latexPath);

  if (report.failures.length > 0) {
    console.log(`\n⚠️  ${report.failures.length} tuples failed`);
  }
}

main()
  .then(() => {
    cleanupEncoder();
    process.exit(0);
  })
  .catch(error => {
    console.error(`Fatal error during evaluation: ${errorMessage(error)}`);
    process.exit(1);
  });
