import { useState } from "react";
import type { ViewConfig } from "../types";
import { useData } from "../hooks/useData";
import { useFilters } from "../hooks/useFilters";
import { costBounds, primaryBounds, yearsOf } from "../lib/defaults";
import { defaultMetricId, labelsFor } from "../lib/views";
import { Sidebar } from "./Sidebar";
import { Dashboard } from "./Dashboard";

interface Props {
  view: ViewConfig;
}

/** One self-contained view: its own dataset, its own criteria. */
export function DatasetView({ view }: Props) {
  const [metricId, setMetricId] = useState(() => defaultMetricId(view));
  const { dataset, loading, error, dropped } = useData(view, metricId);
  const {
    criteria,
    defaults,
    toggleCategory,
    setPrimaryMin,
    setPrimaryMax,
    setCostCeiling,
    setYear,
    resetFilters,
    outcome,
  } = useFilters(dataset);

  if (loading) {
    return (
      <div style={styles.center}>
        <div style={styles.spinner} />
        <p style={styles.loadText}>Loading {view.title.toLowerCase()} data...</p>
      </div>
    );
  }

  const bounds = primaryBounds(dataset);
  const labels = labelsFor(view, metricId);

  return (
    <div style={styles.layout}>
      <Sidebar
        labels={labels}
        criteria={criteria}
        allCategories={defaults.categories}
        primaryBounds={bounds}
        costBounds={costBounds(dataset)}
        years={yearsOf(dataset)}
        metrics={view.metrics ?? []}
        metricId={metricId}
        setMetric={setMetricId}
        toggleCategory={toggleCategory}
        setPrimaryMin={setPrimaryMin}
        setPrimaryMax={setPrimaryMax}
        setCostCeiling={setCostCeiling}
        setYear={setYear}
        resetFilters={resetFilters}
      />
      <Dashboard
        view={view}
        labels={labels}
        dataset={dataset}
        outcome={outcome}
        categories={defaults.categories}
        primaryBounds={bounds}
        loadError={error}
        dropped={dropped}
      />
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  layout: { display: "flex", flex: 1, minHeight: 0 },
  center: {
    display: "flex",
    flexDirection: "column",
    alignItems: "center",
    justifyContent: "center",
    flex: 1,
    gap: 8,
  },
  spinner: {
    width: 32,
    height: 32,
    border: "3px solid #e2e8f0",
    borderTopColor: "#3b82f6",
    borderRadius: "50%",
    animation: "spin 0.8s linear infinite",
  },
  loadText: { color: "#64748b", fontSize: 14 },
};
