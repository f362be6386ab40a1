import type { Dataset, MetricLabels, NumericRange, PipelineOutcome, ViewConfig } from "../types";
import { describeSummary } from "../lib/insights";
import { Insights } from "./Insights";
import { StatusMessage } from "./StatusMessage";
import { MetricScatter } from "./charts/MetricScatter";
import { PrimaryBarChart } from "./charts/PrimaryBarChart";
import { CategoryBreakdown } from "./charts/CategoryBreakdown";
import { RecordsTable } from "./tables/RecordsTable";

interface Props {
  view: ViewConfig;
  labels: MetricLabels;
  dataset: Dataset;
  outcome: PipelineOutcome;
  categories: readonly string[];
  primaryBounds: NumericRange;
  loadError: string | null;
  dropped: number;
}

function Body({ labels, dataset, outcome, categories, primaryBounds, loadError }: Props) {
  if (outcome.status === "empty-dataset") {
    return loadError ? (
      <StatusMessage title="Failed to load data" message={loadError} tone="error" />
    ) : (
      <StatusMessage title="No data available" message="The dataset has no usable records." />
    );
  }

  if (outcome.status === "invalid-criteria") {
    return <StatusMessage title="Invalid filter range" message={outcome.message} tone="error" />;
  }

  const { filtered, summary } = outcome;
  if (summary.kind === "no-data") {
    return (
      <StatusMessage
        title="No matching records"
        message={describeSummary(summary, labels).join(" ")}
      />
    );
  }

  return (
    <>
      <Insights summary={summary} labels={labels} />
      {dataset.hasCost ? (
        <MetricScatter records={filtered} categories={categories} labels={labels} />
      ) : (
        <PrimaryBarChart records={filtered} categories={categories} labels={labels} />
      )}
      <CategoryBreakdown records={filtered} labels={labels} primaryBounds={primaryBounds} />
      <RecordsTable records={filtered} labels={labels} hasCost={dataset.hasCost} />
    </>
  );
}

export function Dashboard(props: Props) {
  const { view, dataset, dropped } = props;

  return (
    <div style={styles.main}>
      <div style={styles.header}>
        <div>
          <h1 style={styles.h1}>{view.title}</h1>
          <p style={styles.subtitle}>
            {view.description} | {dataset.records.length} records
          </p>
        </div>
      </div>

      {dropped > 0 && (
        <div style={styles.warning}>
          {dropped} row(s) skipped for missing or non-numeric values.
        </div>
      )}

      <Body {...props} />
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  main: {
    flex: 1,
    padding: 24,
    overflowY: "auto",
    display: "flex",
    flexDirection: "column",
    gap: 20,
    background: "#f1f5f9",
  },
  header: { display: "flex", justifyContent: "space-between", alignItems: "center" },
  h1: { margin: 0, fontSize: 22, fontWeight: 700, color: "#0f172a" },
  subtitle: { margin: "4px 0 0", fontSize: 13, color: "#64748b" },
  warning: {
    fontSize: 12,
    color: "#92400e",
    background: "#fef3c7",
    borderRadius: 6,
    padding: "8px 12px",
  },
};
