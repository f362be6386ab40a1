const COLORS = ["#3b82f6", "#22c55e", "#f59e0b", "#ef4444", "#8b5cf6", "#ec4899", "#06b6d4"];

export function categoryColor(categories: readonly string[], category: string): string {
  const i = categories.indexOf(category);
  return COLORS[(i === -1 ? 0 : i) % COLORS.length];
}
