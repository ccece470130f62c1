/**
 * CLI script for generating perturbed variants of the filtered questions.
 *
 * The perturbed table is saved after every record; cells already present are
 * kept, so an interrupted run resumes with the missing ones.
 *
 * Usage:
 *   npm run perturb                                       # data/filtered.csv -> data/perturbed.csv
 *   npm run perturb -- --types typo,synonym               # Only these perturbation types
 *   npm run perturb -- --intensity typo=75,bias=50        # Override the per-type default intensity
 *   npm run perturb -- --typo-seed 42                     # Fixed seed for the typo routine
 */
import { dataPath, formatZodError, loadEnv, optionalNumber, requireLlmConfig, splitList } from "./shared";
import { loadRecords } from "~~/services/dataset";
import { LLM_CONFIG, cleanupEncoder, createRequestClient, formatUsage } from "~~/services/llm";
import { PerturbationGenerator, PerturbationRunConfigSchema, runPerturbationBatch } from "~~/services/perturbation";
import { errorMessage } from "~~/utils/errors";

loadEnv();

function parseIntensities(value: string | undefined): Record<string, number> {
  const intensities: Record<string, number> = {};
  for (const entry of splitList(value) ?? []) {
    const [type, level] = entry.split("=");
    intensities[type.trim()] = Number(level);
  }
  return intensities;
}

function parseArgs(argv: string[]) {
  const raw: Record<string, unknown> = {
    inputPath: dataPath("filtered.csv"),
    outputPath: dataPath("perturbed.csv"),
    failurePath: dataPath("perturbation-failures.csv"),
    modelId: process.env.LLM_MODEL || LLM_CONFIG.defaultModel,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--input":
        raw.inputPath = argv[++i];
        break;
      case "--output":
        raw.outputPath = argv[++i];
        break;
      case "--failures":
        raw.failurePath = argv[++i];
        break;
      case "--model":
        raw.modelId = argv[++i];
        break;
      case "--types":
        raw.types = splitList(argv[++i]);
        break;
      case "--intensity":
        raw.intensities = parseIntensities(argv[++i]);
        break;
      case "--typo-seed":
        raw.typoSeed = optionalNumber(argv[++i]);
        break;
      case "--temperature":
        raw.temperature = optionalNumber(argv[++i]);
        break;
      default:
        console.error(`Unknown argument: ${argv[i]}`);
        process.exit(1);
    }
  }

  const parsed = PerturbationRunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(`Invalid arguments:\n${formatZodError(parsed.error)}`);
    process.exit(1);
  }
  return parsed.data;
}

async function main() {
  const config = parseArgs(process.argv.slice(2));
  // typo needs no endpoint
  const needsModel = config.types.some(type => type !== "typo");
  if (needsModel) requireLlmConfig();

  console.log("=".repeat(60));
  console.log("  Question Perturbation");
  console.log("=".repeat(60));
  console.log(`  Input:    ${config.inputPath}`);
  console.log(`  Types:    ${config.types.join(", ")}`);
  console.log(`  Model:    ${config.modelId}`);
  console.log("");

  const records = loadRecords(config.inputPath);
  const client = createRequestClient();
  if (needsModel) await client.verifyModel(config.modelId);
  const generator = new PerturbationGenerator({
    client,
    modelId: config.modelId,
    temperature: config.temperature,
    typoSeed: config.typoSeed,
  });

  const summary = await runPerturbationBatch({
    records,
    types: config.types,
    intensities: config.intensities,
    generator,
    outputPath: config.outputPath,
    failurePath: config.failurePath,
  });

  console.log("");
  console.log("-".repeat(60));
  console.log(`  Generated:  ${summary.generated}`);
  console.log(`  Reused:     ${summary.reused}`);
  console.log(`  Failed:     ${summary.failures.length}`);
  console.log(formatUsage(client.usage.snapshot()));
  console.log(`\nPerturbed table saved to: ${config.outputPath}`);
}

main()
  .then(() => {
    cleanupEncoder();
    process.exit(0);
  })
  .catch(error => {
    console.error(`Fatal error during perturbation: ${errorMessage(error)}`);
    process.exit(1);
  });
