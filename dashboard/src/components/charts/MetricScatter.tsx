import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Cell,
} from "recharts";
import type { FilteredResult, MetricLabels } from "../../types";
import { categoryColor } from "./palette";

interface Props {
  records: FilteredResult;
  categories: readonly string[];
  labels: MetricLabels;
}

export function MetricScatter({ records, categories, labels }: Props) {
  const points = records.flatMap((r) =>
    r.costMetric === undefined
      ? []
      : [{ name: r.name, category: r.category, cost: r.costMetric, primary: r.primaryMetric }]
  );
  if (points.length === 0) return null;

  const shown = categories.filter((c) => points.some((p) => p.category === c));

  return (
    <div style={styles.container}>
      <h3 style={styles.title}>
        {labels.cost} vs {labels.primary}
      </h3>
      <ResponsiveContainer width="100%" height={300}>
        <ScatterChart margin={{ left: 10, right: 20, bottom: 10 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#f1f5f9" />
          <XAxis type="number" dataKey="cost" name={labels.cost} tick={{ fontSize: 12 }} label={{ value: labels.cost, position: "bottom", fontSize: 12 }} />
          <YAxis type="number" dataKey="primary" name={labels.primary} tick={{ fontSize: 12 }} domain={["auto", "auto"]} label={{ value: labels.primary, angle: -90, position: "insideLeft", fontSize: 12 }} />
          <Tooltip
            labelFormatter={(_: unknown, payload: ReadonlyArray<{payload?: {name?: string}}>) => payload?.[0]?.payload?.name ?? ""}
          />
          <Scatter data={points}>
            {points.map((p) => (
              <Cell key={p.name} fill={categoryColor(categories, p.category)} />
            ))}
          </Scatter>
        </ScatterChart>
      </ResponsiveContainer>
      <div style={styles.legend}>
        {shown.map((c) => (
          <span key={c} style={styles.legendItem}>
            <span style={{ ...styles.dot, background: categoryColor(categories, c) }} />
            {c}
          </span>
        ))}
      </div>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  container: { background: "#fff", borderRadius: 8, padding: 16, boxShadow: "0 1px 3px rgba(0,0,0,0.08)" },
  title: { fontSize: 14, fontWeight: 600, marginBottom: 8, color: "#1e293b" },
  legend: { display: "flex", flexWrap: "wrap", gap: 12, marginTop: 8, justifyContent: "center" },
  legendItem: { display: "flex", alignItems: "center", gap: 4, fontSize: 12 },
  dot: { width: 8, height: 8, borderRadius: "50%", display: "inline-block" },
};
