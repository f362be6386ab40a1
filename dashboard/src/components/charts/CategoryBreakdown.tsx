import type { FilteredResult, MetricLabels, NumericRange } from "../../types";
import { summarizeByCategory } from "../../lib/summarize";
import { formatCost, formatMetric } from "../../lib/format";

interface Props {
  records: FilteredResult;
  labels: MetricLabels;
  primaryBounds: NumericRange;
}

export function CategoryBreakdown({ records, labels, primaryBounds }: Props) {
  const stats = summarizeByCategory(records);
  if (stats.length === 0) return null;
  const showCost = stats.some((s) => s.meanCost !== undefined);

  // Shade by where the category mean sits within the dataset's observed range.
  const getColor = (score: number) => {
    const span = primaryBounds.max - primaryBounds.min;
    const t = span > 0 ? (score - primaryBounds.min) / span : 1;
    if (t >= 0.75) return "#22c55e";
    if (t >= 0.5) return "#84cc16";
    if (t >= 0.25) return "#f59e0b";
    return "#ef4444";
  };

  return (
    <div style={styles.container}>
      <h3 style={styles.title}>By {labels.category}</h3>
      <div style={styles.grid}>
        <div style={styles.headerRow}>
          <div style={styles.cornerCell} />
          <div style={styles.headerCell}>Records</div>
          <div style={styles.headerCell}>Avg {labels.primary}</div>
          {showCost && <div style={styles.headerCell}>Avg {labels.cost}</div>}
        </div>
        {stats.map((s) => (
          <div key={s.category} style={styles.row}>
            <div style={styles.rowLabel}>{s.category}</div>
            <div style={{ ...styles.cell, background: "#f1f5f9" }}>{s.count}</div>
            <div style={{ ...styles.cell, background: getColor(s.meanPrimary), color: "#fff" }}>
              {formatMetric(s.meanPrimary)}
            </div>
            {showCost && (
              <div style={{ ...styles.cell, background: "#f1f5f9" }}>
                {s.meanCost !== undefined ? formatCost(s.meanCost, labels.costPrefix) : "-"}
              </div>
            )}
          </div>
        ))}
      </div>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  container: { background: "#fff", borderRadius: 8, padding: 16, boxShadow: "0 1px 3px rgba(0,0,0,0.08)" },
  title: { fontSize: 14, fontWeight: 600, marginBottom: 12, color: "#1e293b" },
  grid: { overflowX: "auto" },
  headerRow: { display: "flex", gap: 2, marginBottom: 2 },
  cornerCell: { width: 140, flexShrink: 0 },
  headerCell: { flex: 1, minWidth: 100, fontSize: 11, fontWeight: 600, textAlign: "center" as const, padding: "6px 2px", color: "#475569" },
  row: { display: "flex", gap: 2, marginBottom: 2 },
  rowLabel: { width: 140, flexShrink: 0, fontSize: 12, padding: "8px 4px", color: "#475569" },
  cell: { flex: 1, minWidth: 100, textAlign: "center" as const, padding: "8px 4px", borderRadius: 4, fontSize: 13, fontWeight: 600 },
};
