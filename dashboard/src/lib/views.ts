import type { DatasetSchema, MetricLabels, MetricOption, ViewConfig } from "../types";

export function defaultMetricId(view: ViewConfig): string | null {
  return view.metrics?.[0]?.id ?? null;
}

export function metricOption(view: ViewConfig, metricId: string | null): MetricOption | null {
  if (!view.metrics || metricId === null) return null;
  return view.metrics.find((m) => m.id === metricId) ?? null;
}

/** The view's schema with the chosen metric as its primary column. */
export function schemaFor(view: ViewConfig, metricId: string | null): DatasetSchema {
  const option = metricOption(view, metricId);
  return option ? { ...view.schema, primary: option.column } : view.schema;
}

export function labelsFor(view: ViewConfig, metricId: string | null): MetricLabels {
  const option = metricOption(view, metricId);
  return option ? { ...view.labels, primary: option.label } : view.labels;
}
