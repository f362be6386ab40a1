import type { DataSummary, MetricLabels } from "../types";
import { describeSummary } from "../lib/insights";
import { formatCost, formatMetric } from "../lib/format";
import { MetricCard } from "./cards/MetricCard";

interface Props {
  summary: DataSummary;
  labels: MetricLabels;
}

export function Insights({ summary, labels }: Props) {
  const cost = (v: number) => formatCost(v, labels.costPrefix);

  return (
    <>
      <div style={styles.cards}>
        <MetricCard
          title="Records"
          value={summary.count}
          format={String}
          subtitle={`of ${summary.total} total`}
          color="#64748b"
        />
        <MetricCard
          title={`Avg ${labels.primary}`}
          value={summary.meanPrimary}
          format={formatMetric}
          subtitle={`${formatMetric(summary.minPrimary)} to ${formatMetric(summary.maxPrimary)}`}
          color="#3b82f6"
        />
        {summary.meanCost !== undefined && (
          <MetricCard
            title={`Avg ${labels.cost}`}
            value={summary.meanCost}
            format={cost}
            color="#8b5cf6"
          />
        )}
        {summary.bestValue?.costMetric !== undefined && (
          <MetricCard
            title="Most Cost-Effective"
            value={summary.bestValue.costMetric}
            format={cost}
            record={summary.bestValue}
            color="#f59e0b"
          />
        )}
        <MetricCard
          title={`Highest ${labels.primary}`}
          value={summary.bestPrimary.primaryMetric}
          format={formatMetric}
          record={summary.bestPrimary}
          color="#22c55e"
        />
      </div>
      <ul style={styles.narrative}>
        {describeSummary(summary, labels).map((line) => (
          <li key={line}>{line}</li>
        ))}
      </ul>
    </>
  );
}

const styles: Record<string, React.CSSProperties> = {
  cards: { display: "flex", gap: 16, flexWrap: "wrap" },
  narrative: {
    margin: 0,
    padding: "12px 16px 12px 32px",
    background: "#fff",
    borderRadius: 8,
    boxShadow: "0 1px 3px rgba(0,0,0,0.08)",
    fontSize: 13,
    lineHeight: 1.7,
    color: "#334155",
  },
};
