import type { MetricLabels, Summary } from "../types";
import { formatCost, formatMetric } from "./format";

export function describeSummary(summary: Summary, labels: MetricLabels): string[] {
  if (summary.kind === "no-data") {
    return [`No records match the current filters (0 of ${summary.total}).`];
  }

  const lines = [
    `Showing ${summary.count} of ${summary.total} records.`,
    `Average ${labels.primary}: ${formatMetric(summary.meanPrimary)}.`,
  ];
  if (summary.meanCost !== undefined) {
    lines.push(`Average ${labels.cost}: ${formatCost(summary.meanCost, labels.costPrefix)}.`);
  }
  if (summary.bestValue?.costMetric !== undefined) {
    lines.push(
      `Most cost-effective: ${summary.bestValue.name} at ${formatCost(
        summary.bestValue.costMetric,
        labels.costPrefix
      )}.`
    );
  }
  lines.push(
    `Highest ${labels.primary}: ${summary.bestPrimary.name} (${formatMetric(
      summary.bestPrimary.primaryMetric
    )}).`
  );
  return lines;
}
