import type { Dataset, FilterCriteria, PipelineOutcome } from "../types";
import { InvalidRangeError } from "./errors";
import { filterRecords } from "./filter";
import { summarize } from "./summarize";

export function runPipeline(dataset: Dataset, criteria: FilterCriteria): PipelineOutcome {
  if (dataset.records.length === 0) return { status: "empty-dataset" };

  try {
    const filtered = filterRecords(dataset, criteria);
    return { status: "ready", filtered, summary: summarize(dataset, filtered) };
  } catch (err) {
    if (err instanceof InvalidRangeError) {
      return { status: "invalid-criteria", message: err.message };
    }
    throw err;
  }
}
