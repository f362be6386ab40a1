export function formatMetric(value: number, digits = 2): string {
  return value.toFixed(digits);
}

export function formatCost(value: number, prefix = ""): string {
  return `${prefix}${formatMetric(value)}`;
}

/** Slider step for a numeric range: about a hundred stops, never zero. */
export function sliderStep(min: number, max: number): number {
  const span = max - min;
  if (span <= 0) return 1;
  return 10 ** Math.floor(Math.log10(span / 100));
}
