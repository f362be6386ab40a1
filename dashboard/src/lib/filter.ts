import type { DataRecord, Dataset, FilterCriteria, FilteredResult } from "../types";
import { InvalidRangeError } from "./errors";

export function validateCriteria(criteria: FilterCriteria): void {
  const { min, max } = criteria.primaryRange;
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new InvalidRangeError(
      `Range bounds must be numbers (got ${min} to ${max})`,
      criteria.primaryRange
    );
  }
  if (min > max) {
    throw new InvalidRangeError(
      `Minimum ${min} is greater than maximum ${max}`,
      criteria.primaryRange
    );
  }
  if (criteria.costCeiling !== undefined && !Number.isFinite(criteria.costCeiling)) {
    throw new InvalidRangeError(`Cost ceiling must be a number (got ${criteria.costCeiling})`);
  }
  if (criteria.year !== undefined && !Number.isInteger(criteria.year)) {
    throw new InvalidRangeError(`Year must be a whole number (got ${criteria.year})`);
  }
}

export function matchesCategory(record: DataRecord, categories: ReadonlySet<string>) {
  return categories.has(record.category);
}

export function matchesPrimaryRange(record: DataRecord, criteria: FilterCriteria) {
  const { min, max } = criteria.primaryRange;
  return record.primaryMetric >= min && record.primaryMetric <= max;
}

export function matchesCostCeiling(record: DataRecord, dataset: Dataset, criteria: FilterCriteria) {
  if (!dataset.hasCost || criteria.costCeiling === undefined) return true;
  return record.costMetric !== undefined && record.costMetric <= criteria.costCeiling;
}

export function matchesYear(record: DataRecord, dataset: Dataset, criteria: FilterCriteria) {
  if (!dataset.hasYear || criteria.year === undefined) return true;
  return record.year === criteria.year;
}

/**
 * Keeps the records passing every active predicate, in dataset order.
 * An empty category selection matches nothing.
 */
export function filterRecords(dataset: Dataset, criteria: FilterCriteria): FilteredResult {
  validateCriteria(criteria);
  const categories = new Set(criteria.categories);

  return dataset.records.filter(
    (r) =>
      matchesCategory(r, categories) &&
      matchesPrimaryRange(r, criteria) &&
      matchesCostCeiling(r, dataset, criteria) &&
      matchesYear(r, dataset, criteria)
  );
}
