import type { DataRecord } from "../../types";

interface MetricCardProps {
  title: string;
  /** Raw value; shown through `format` and kept unrounded in the tooltip. */
  value: number;
  format: (v: number) => string;
  /** Record the value belongs to, named under the figure. */
  record?: DataRecord;
  subtitle?: string;
  color: string;
}

export function MetricCard({ title, value, format, record, subtitle, color }: MetricCardProps) {
  const caption = record?.year !== undefined ? `${record.name} (${record.year})` : record?.name ?? subtitle;

  return (
    <section aria-label={title} style={{ ...styles.card, borderTop: `3px solid ${color}` }}>
      <div style={styles.title}>{title}</div>
      <data value={String(value)} title={String(value)} style={{ ...styles.value, color }}>
        {format(value)}
      </data>
      {caption && <div style={styles.subtitle}>{caption}</div>}
    </section>
  );
}

const styles: Record<string, React.CSSProperties> = {
  card: {
    background: "#fff",
    borderRadius: 8,
    padding: "16px 20px",
    boxShadow: "0 1px 3px rgba(0,0,0,0.08)",
    minWidth: 180,
    flex: 1,
  },
  title: { fontSize: 12, color: "#64748b", textTransform: "uppercase" as const, letterSpacing: 0.5 },
  value: { display: "block", fontSize: 26, fontWeight: 700, margin: "4px 0" },
  subtitle: { fontSize: 13, color: "#94a3b8" },
};
