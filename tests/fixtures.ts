import type {
  ColumnSpec,
  Dataset,
  DatasetSchema,
  FilterCriteria,
  MetricLabels,
} from "../dashboard/src/types";

export const SAMPLE: Dataset = {
  hasCost: true,
  records: [
    { name: "Lentils", primaryMetric: 78, costMetric: 0.4, category: "Asia" },
    { name: "Chicken", primaryMetric: 85, costMetric: 0.7, category: "US" },
    { name: "Soy", primaryMetric: 92, costMetric: 0.5, category: "Asia" },
    { name: "Milk", primaryMetric: 50, costMetric: 0.6, category: "Europe" },
    { name: "Egg", primaryMetric: 88, costMetric: 0.45, category: "US" },
  ],
};

export const SAMPLE_CRITERIA: FilterCriteria = {
  categories: ["Asia", "US"],
  primaryRange: { min: 70, max: 100 },
  costCeiling: 0.7,
};

export const SCORES_ONLY: Dataset = {
  hasCost: false,
  records: [
    { name: "Finland", primaryMetric: 83.7, category: "Europe" },
    { name: "Kenya", primaryMetric: 48.3, category: "Africa" },
    { name: "Japan", primaryMetric: 79.2, category: "Asia" },
  ],
};

export const YEARLY: Dataset = {
  hasCost: false,
  hasYear: true,
  records: [
    { name: "Finland", primaryMetric: 82.1, category: "Europe", year: 2021 },
    { name: "Kenya", primaryMetric: 47.5, category: "Africa", year: 2021 },
    { name: "Finland", primaryMetric: 83.7, category: "Europe", year: 2023 },
    { name: "Kenya", primaryMetric: 48.3, category: "Africa", year: 2023 },
    { name: "Japan", primaryMetric: 79.2, category: "Asia", year: 2022 },
  ],
};

export const COST_COLUMN: ColumnSpec = {
  aliases: ["Cost per gram protein", "Cost per g Protein ($)"],
  required: true,
};

export const SCHEMA: DatasetSchema = {
  name: { aliases: ["Food", "Food Source"], required: true },
  primary: { aliases: ["Protein Index"], required: true },
  cost: COST_COLUMN,
  category: { aliases: ["Region"], required: true },
};

export const OPTIONAL_COST_SCHEMA: DatasetSchema = {
  ...SCHEMA,
  cost: { ...COST_COLUMN, required: false },
};

export const YEARLY_SCHEMA: DatasetSchema = {
  name: { aliases: ["Country"], required: true },
  primary: { aliases: ["GFSI Score"], required: true },
  category: { aliases: ["Region"], required: true },
  year: { aliases: ["Year"], required: false },
};

export const LABELS: MetricLabels = {
  name: "Food",
  primary: "Protein Index",
  cost: "Cost per gram protein",
  category: "Region",
  costPrefix: "$",
};

export const names = (records: readonly { name: string }[]) => records.map((r) => r.name);
