import { useState } from "react";
import type { DataRecord, FilteredResult, MetricLabels } from "../../types";
import { formatCost, formatMetric } from "../../lib/format";

interface Props {
  records: FilteredResult;
  labels: MetricLabels;
  hasCost: boolean;
}

type SortKey = keyof DataRecord;

export function RecordsTable({ records, labels, hasCost }: Props) {
  const [sortKey, setSortKey] = useState<SortKey | null>(null);
  const [sortDir, setSortDir] = useState<"asc" | "desc">("asc");

  const toggleSort = (key: SortKey) => {
    if (sortKey === key) {
      setSortDir((d) => (d === "asc" ? "desc" : "asc"));
    } else {
      setSortKey(key);
      setSortDir("asc");
    }
  };

  // Unsorted means dataset order.
  const sorted = sortKey
    ? [...records].sort((a, b) => {
        const av = a[sortKey] ?? "";
        const bv = b[sortKey] ?? "";
        const cmp = av < bv ? -1 : av > bv ? 1 : 0;
        return sortDir === "asc" ? cmp : -cmp;
      })
    : records;

  const columns: [SortKey, string][] = [
    ["name", labels.name],
    ["category", labels.category],
    ["primaryMetric", labels.primary],
  ];
  if (hasCost) columns.push(["costMetric", labels.cost]);

  const SortIcon = ({ col }: { col: SortKey }) =>
    sortKey === col ? <span>{sortDir === "asc" ? " ▲" : " ▼"}</span> : null;

  return (
    <div style={styles.container}>
      <h3 style={styles.title}>Records ({records.length})</h3>
      <div style={styles.tableWrap}>
        <table style={styles.table}>
          <thead>
            <tr>
              {columns.map(([key, label]) => (
                <th key={key} style={styles.th} onClick={() => toggleSort(key)}>
                  {label}
                  <SortIcon col={key} />
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {sorted.map((r, i) => (
              <tr key={r.name} style={i % 2 === 0 ? styles.evenRow : undefined}>
                <td style={{ ...styles.td, fontWeight: 500 }}>{r.name}</td>
                <td style={styles.td}>{r.category}</td>
                <td style={styles.tdRight}>{formatMetric(r.primaryMetric)}</td>
                {hasCost && (
                  <td style={styles.tdRight}>
                    {r.costMetric !== undefined ? formatCost(r.costMetric, labels.costPrefix) : "-"}
                  </td>
                )}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  container: { background: "#fff", borderRadius: 8, padding: 16, boxShadow: "0 1px 3px rgba(0,0,0,0.08)" },
  title: { fontSize: 14, fontWeight: 600, marginBottom: 12, color: "#1e293b" },
  tableWrap: { overflowX: "auto" },
  table: { width: "100%", borderCollapse: "collapse", fontSize: 12 },
  th: { padding: "8px 10px", textAlign: "left" as const, borderBottom: "2px solid #e2e8f0", color: "#64748b", fontWeight: 600, cursor: "pointer", whiteSpace: "nowrap" as const, userSelect: "none" as const },
  td: { padding: "6px 10px", borderBottom: "1px solid #f1f5f9" },
  tdRight: { padding: "6px 10px", borderBottom: "1px solid #f1f5f9", textAlign: "right" as const },
  evenRow: { background: "#f8fafc" },
};
