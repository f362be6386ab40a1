import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Cell,
} from "recharts";
import type { FilteredResult, MetricLabels } from "../../types";
import { formatMetric } from "../../lib/format";
import { categoryColor } from "./palette";

interface Props {
  records: FilteredResult;
  categories: readonly string[];
  labels: MetricLabels;
}

export function PrimaryBarChart({ records, categories, labels }: Props) {
  const data = records
    .map((r) => ({ name: r.name, category: r.category, primary: r.primaryMetric }))
    .sort((a, b) => b.primary - a.primary);

  return (
    <div style={styles.container}>
      <h3 style={styles.title}>{labels.primary} by {labels.name}</h3>
      <ResponsiveContainer width="100%" height={Math.max(200, data.length * 28)}>
        <BarChart data={data} layout="vertical" margin={{ left: 120, right: 40 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#f1f5f9" />
          <XAxis type="number" tick={{ fontSize: 12 }} />
          <YAxis dataKey="name" type="category" tick={{ fontSize: 12 }} width={110} />
          <Tooltip formatter={(v) => [typeof v === "number" ? formatMetric(v) : String(v), labels.primary]} />
          <Bar dataKey="primary" radius={[0, 4, 4, 0]}>
            {data.map((d) => (
              <Cell key={d.name} fill={categoryColor(categories, d.category)} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  container: { background: "#fff", borderRadius: 8, padding: 16, boxShadow: "0 1px 3px rgba(0,0,0,0.08)" },
  title: { fontSize: 14, fontWeight: 600, marginBottom: 8, color: "#1e293b" },
};
