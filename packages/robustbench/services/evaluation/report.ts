// Report Formatting - Console output, JSON file export and LaTeX table
import { EvaluationRunReport } from "./types";
import { writeFile } from "fs/promises";
import { formatUsage } from "~~/services/llm";
import { PERTURBATION_TYPES, PerturbationType, RobustnessCounts, RobustnessReport } from "~~/types/benchmark";

export function formatPercent(value: number | null): string {
  return value === null ? "N/A" : `${(value * 100).toFixed(1)}%`;
}

function formatDelta(value: number | null): string {
  if (value === null) return "N/A";
  const points = (value * 100).toFixed(1);
  return value > 0 ? `+${points}` : points;
}

function formatCounts(counts: RobustnessCounts): string {
  return `acc=${formatPercent(counts.accuracy).padStart(6)}  correct=${counts.correct}/${counts.scored}  failed=${counts.failed}/${counts.total}`;
}

/**
 * Print the evaluation report to the console.
 * Cells without a scored tuple show N/A, never zero.
 */
export function printReport(report: EvaluationRunReport): void {
  const { robustness, config } = report;

  console.log("");
  console.log("=".repeat(60));
  console.log("  Robustness Evaluation Report");
  console.log("=".repeat(60));
  console.log("");

  console.log(`  Timestamp:    ${report.timestamp}`);
  if (report.gitCommit) console.log(`  Git commit:   ${report.gitCommit}`);
  console.log(`  Model:        ${config.modelId}`);
  console.log(`  Strategy:     preproc=${config.preproc} inproc=${config.inproc} postproc=${config.postproc}`);
  console.log(`  Temperature:  ${config.temperature}`);
  console.log(
    `  Tuples:       ${report.tuples.total} (${report.tuples.evaluated} evaluated, ${report.tuples.reused} from ledger, ${report.tuples.missing} missing variants)`,
  );
  console.log("");

  console.log("-".repeat(60));
  console.log("  PER DATASET x PERTURBATION");
  console.log("-".repeat(60));

  let currentDataset = "";
  for (const cell of robustness.cells) {
    if (cell.datasetName !== currentDataset) {
      currentDataset = cell.datasetName;
      console.log("");
      console.log(`  ${currentDataset}`);
    }
    const delta = cell.perturbationType === "none" ? "" : `  delta=${formatDelta(cell.deltaVsControl)}`;
    const consistency = cell.consistency
      ? `  rouge_sim=${cell.consistency.rougeL.toFixed(3)} bleu_sim=${cell.consistency.bleu.toFixed(3)}`
      : "";
    console.log(`    ${cell.perturbationType.padEnd(13)} ${formatCounts(cell)}${delta}${consistency}`);
  }

  console.log("");
  console.log("-".repeat(60));
  console.log("  SUMMARY");
  console.log("-".repeat(60));
  for (const dataset of robustness.datasets) {
    console.log(`  ${dataset.datasetName.padEnd(17)} ${formatCounts(dataset)}`);
  }
  console.log("");
  for (const perturbation of robustness.perturbations) {
    console.log(`  ${perturbation.perturbationType.padEnd(17)} ${formatCounts(perturbation)}`);
  }
  console.log("");
  console.log(`  ${"overall".padEnd(17)} ${formatCounts(robustness.overall)}`);

  if (report.failures.length > 0) {
    console.log("");
    console.log(`  ${report.failures.length} tuples FAILED:`);
    for (const failure of report.failures.slice(0, 10)) {
      console.log(`    ${failure.key} at ${failure.state}: ${failure.kind} ${failure.message}`);
    }
    if (report.failures.length > 10) console.log(`    ... and ${report.failures.length - 10} more`);
  }

  console.log("");
  console.log("-".repeat(60));
  console.log("  USAGE");
  console.log("-".repeat(60));
  console.log(formatUsage(report.usage));
  console.log("");
  console.log("=".repeat(60));
}

/**
 * Save the full evaluation report as JSON.
 */
export async function saveReport(report: EvaluationRunReport, outputPath: string): Promise<void> {
  const json = JSON.stringify(report, null, 2);
  await writeFile(outputPath, json, "utf-8");
  console.log(`\nReport saved to: ${outputPath}`);
}

function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}]/g, char => (char === "\\" ? "\\textbackslash{}" : `\\${char}`));
}

function latexPercent(value: number | null): string {
  return value === null ? "N/A" : (value * 100).toFixed(1);
}

/**
 * Accuracy per dataset (rows) and perturbation (columns) as a LaTeX tabular.
 */
export function renderLatexTable(robustness: RobustnessReport): string {
  const perturbations: PerturbationType[] = PERTURBATION_TYPES.filter(type =>
    robustness.cells.some(cell => cell.perturbationType === type),
  );

  const lines = [
    `\\begin{tabular}{l${"r".repeat(perturbations.length + 1)}}`,
    "\\hline",
    `Dataset & ${[...perturbations, "overall"].map(escapeLatex).join(" & ")} \\\\`,
    "\\hline",
  ];

  for (const dataset of robustness.datasets) {
    const values = perturbations.map(type => {
      const cell = robustness.cells.find(c => c.datasetName === dataset.datasetName && c.perturbationType === type);
      return latexPercent(cell ? cell.accuracy : null);
    });
    lines.push(`${escapeLatex(dataset.datasetName)} & ${[...values, latexPercent(dataset.accuracy)].join(" & ")} \\\\`);
  }

  const totals = perturbations.map(type => {
    const summary = robustness.perturbations.find(p => p.perturbationType === type);
    return latexPercent(summary ? summary.accuracy : null);
  });
  lines.push("\\hline");
  lines.push(`overall & ${[...totals, latexPercent(robustness.overall.accuracy)].join(" & ")} \\\\`);
  lines.push("\\hline");
  lines.push("\\end{tabular}");

  return `${lines.join("\n")}\n`;
}

export async function saveLatexTable(robustness: RobustnessReport, outputPath: string): Promise<void> {
  await writeFile(outputPath, renderLatexTable(robustness), "utf-8");
  console.log(`LaTeX table saved to: ${outputPath}`);
}
