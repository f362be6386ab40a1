import type { Dataset, FilterCriteria, NumericRange } from "../types";

export function observedRange(values: readonly number[]): NumericRange | null {
  if (values.length === 0) return null;
  return { min: Math.min(...values), max: Math.max(...values) };
}

export function allCategories(dataset: Dataset): string[] {
  return [...new Set(dataset.records.map((r) => r.category))];
}

export function primaryBounds(dataset: Dataset): NumericRange {
  return observedRange(dataset.records.map((r) => r.primaryMetric)) ?? { min: 0, max: 0 };
}

export function costBounds(dataset: Dataset): NumericRange | null {
  if (!dataset.hasCost) return null;
  return observedRange(
    dataset.records.flatMap((r) => (r.costMetric === undefined ? [] : [r.costMetric]))
  );
}

/** Distinct years in ascending order; empty when the dataset has no year column. */
export function yearsOf(dataset: Dataset): number[] {
  if (!dataset.hasYear) return [];
  const years = dataset.records.flatMap((r) => (r.year === undefined ? [] : [r.year]));
  return [...new Set(years)].sort((a, b) => a - b);
}

/**
 * Every category, the full primary range and no effective cost ceiling.
 * Year-keyed datasets open on their latest year.
 */
export function defaultCriteria(dataset: Dataset): FilterCriteria {
  const criteria: FilterCriteria = {
    categories: allCategories(dataset),
    primaryRange: primaryBounds(dataset),
  };
  const cost = costBounds(dataset);
  if (cost) criteria.costCeiling = cost.max;
  const years = yearsOf(dataset);
  if (years.length > 0) criteria.year = years[years.length - 1];
  return criteria;
}
