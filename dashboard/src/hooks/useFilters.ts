import { useState, useMemo } from "react";
import type { Dataset, FilterCriteria, PipelineOutcome } from "../types";
import { defaultCriteria } from "../lib/defaults";
import { runPipeline } from "../lib/pipeline";

export function toggleCategoryIn(criteria: FilterCriteria, cat: string): FilterCriteria {
  return {
    ...criteria,
    categories: criteria.categories.includes(cat)
      ? criteria.categories.filter((c) => c !== cat)
      : [...criteria.categories, cat],
  };
}

/** Criteria state scoped to one view; defaults follow whatever dataset is loaded. */
export function useFilters(dataset: Dataset) {
  const defaults = useMemo(() => defaultCriteria(dataset), [dataset]);
  const [criteria, setCriteria] = useState<FilterCriteria>(defaults);
  const [criteriaFor, setCriteriaFor] = useState(defaults);

  // A newly loaded dataset resets the criteria; React re-renders before committing.
  if (criteriaFor !== defaults) {
    setCriteriaFor(defaults);
    setCriteria(defaults);
  }

  const toggleCategory = (cat: string) => setCriteria((prev) => toggleCategoryIn(prev, cat));

  const setPrimaryMin = (min: number) =>
    setCriteria((prev) => ({ ...prev, primaryRange: { ...prev.primaryRange, min } }));

  const setPrimaryMax = (max: number) =>
    setCriteria((prev) => ({ ...prev, primaryRange: { ...prev.primaryRange, max } }));

  const setCostCeiling = (costCeiling: number) =>
    setCriteria((prev) => ({ ...prev, costCeiling }));

  const setYear = (year: number) => setCriteria((prev) => ({ ...prev, year }));

  const resetFilters = () => setCriteria(defaults);

  const outcome: PipelineOutcome = useMemo(
    () => runPipeline(dataset, criteria),
    [dataset, criteria]
  );

  return {
    criteria,
    defaults,
    toggleCategory,
    setPrimaryMin,
    setPrimaryMax,
    setCostCeiling,
    setYear,
    resetFilters,
    outcome,
  };
}
