import type {
  CategoryStat,
  DataRecord,
  DataSummary,
  Dataset,
  FilteredResult,
  Summary,
} from "../types";

const mean = (values: number[]) => values.reduce((s, v) => s + v, 0) / values.length;

const costsOf = (records: readonly DataRecord[]) =>
  records.flatMap((r) => (r.costMetric === undefined ? [] : [r.costMetric]));

export function summarize(dataset: Dataset, filtered: FilteredResult): Summary {
  const total = dataset.records.length;
  if (filtered.length === 0) return { kind: "no-data", count: 0, total };

  const primaries = filtered.map((r) => r.primaryMetric);
  // Strict comparisons keep the first occurrence on ties.
  const bestPrimary = filtered.reduce((a, b) => (b.primaryMetric > a.primaryMetric ? b : a));

  const summary: DataSummary = {
    kind: "data",
    count: filtered.length,
    total,
    meanPrimary: mean(primaries),
    minPrimary: Math.min(...primaries),
    maxPrimary: Math.max(...primaries),
    bestPrimary,
  };

  if (dataset.hasCost) {
    const costs = costsOf(filtered);
    if (costs.length > 0) {
      summary.meanCost = mean(costs);
      summary.bestValue = filtered.reduce((a, b) =>
        (b.costMetric ?? Infinity) < (a.costMetric ?? Infinity) ? b : a
      );
    }
  }

  return summary;
}

export function summarizeByCategory(filtered: FilteredResult): CategoryStat[] {
  const byCategory = new Map<string, DataRecord[]>();
  filtered.forEach((r) => {
    const arr = byCategory.get(r.category) || [];
    arr.push(r);
    byCategory.set(r.category, arr);
  });

  return [...byCategory.entries()].map(([category, rs]) => {
    const costs = costsOf(rs);
    return {
      category,
      count: rs.length,
      meanPrimary: mean(rs.map((r) => r.primaryMetric)),
      ...(costs.length > 0 ? { meanCost: mean(costs) } : {}),
    };
  });
}
