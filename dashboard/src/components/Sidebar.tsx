import { useId } from "react";
import type { FilterCriteria, MetricLabels, MetricOption, NumericRange } from "../types";
import { formatMetric, sliderStep } from "../lib/format";

interface SidebarProps {
  labels: MetricLabels;
  criteria: FilterCriteria;
  allCategories: readonly string[];
  primaryBounds: NumericRange;
  costBounds: NumericRange | null;
  /** Distinct years, ascending; no year slider when empty. */
  years: readonly number[];
  metrics: readonly MetricOption[];
  metricId: string | null;
  setMetric: (id: string) => void;
  toggleCategory: (c: string) => void;
  setPrimaryMin: (v: number) => void;
  setPrimaryMax: (v: number) => void;
  setCostCeiling: (v: number) => void;
  setYear: (v: number) => void;
  resetFilters: () => void;
}

export function Sidebar({
  labels,
  criteria,
  allCategories,
  primaryBounds,
  costBounds,
  years,
  metrics,
  metricId,
  setMetric,
  toggleCategory,
  setPrimaryMin,
  setPrimaryMax,
  setCostCeiling,
  setYear,
  resetFilters,
}: SidebarProps) {
  const primaryStep = sliderStep(primaryBounds.min, primaryBounds.max);
  const metricGroup = useId();

  return (
    <aside style={styles.sidebar}>
      <h3 style={styles.heading}>Filters</h3>

      {metrics.length > 1 && (
        <div style={styles.section}>
          <h4 style={styles.subheading}>Metric</h4>
          {metrics.map((m) => (
            <label key={m.id} style={styles.label}>
              <input
                type="radio"
                name={metricGroup}
                value={m.id}
                checked={m.id === metricId}
                onChange={() => setMetric(m.id)}
                style={styles.checkbox}
              />
              {m.label}
            </label>
          ))}
        </div>
      )}

      {years.length > 0 && criteria.year !== undefined && (
        <div style={styles.section}>
          <h4 style={styles.subheading}>Year</h4>
          <label style={styles.sliderLabel}>
            {criteria.year}
            <input
              type="range"
              min={years[0]}
              max={years[years.length - 1]}
              step={1}
              value={criteria.year}
              onChange={(e) => setYear(Number(e.target.value))}
              style={styles.slider}
            />
          </label>
        </div>
      )}

      <div style={styles.section}>
        <h4 style={styles.subheading}>{labels.category}</h4>
        {allCategories.map((c) => {
          const active = criteria.categories.includes(c);
          return (
            <label key={c} style={{ ...styles.label, opacity: active ? 1 : 0.4 }}>
              <input
                type="checkbox"
                checked={active}
                onChange={() => toggleCategory(c)}
                style={styles.checkbox}
              />
              {c}
            </label>
          );
        })}
      </div>

      <div style={styles.section}>
        <h4 style={styles.subheading}>{labels.primary}</h4>
        <label style={styles.sliderLabel}>
          Min: {formatMetric(criteria.primaryRange.min)}
          <input
            type="range"
            min={primaryBounds.min}
            max={primaryBounds.max}
            step={primaryStep}
            value={criteria.primaryRange.min}
            onChange={(e) => setPrimaryMin(Number(e.target.value))}
            style={styles.slider}
          />
        </label>
        <label style={styles.sliderLabel}>
          Max: {formatMetric(criteria.primaryRange.max)}
          <input
            type="range"
            min={primaryBounds.min}
            max={primaryBounds.max}
            step={primaryStep}
            value={criteria.primaryRange.max}
            onChange={(e) => setPrimaryMax(Number(e.target.value))}
            style={styles.slider}
          />
        </label>
      </div>

      {costBounds && criteria.costCeiling !== undefined && (
        <div style={styles.section}>
          <h4 style={styles.subheading}>Max {labels.cost}</h4>
          <label style={styles.sliderLabel}>
            {labels.costPrefix}
            {formatMetric(criteria.costCeiling)}
            <input
              type="range"
              min={costBounds.min}
              max={costBounds.max}
              step={sliderStep(costBounds.min, costBounds.max)}
              value={criteria.costCeiling}
              onChange={(e) => setCostCeiling(Number(e.target.value))}
              style={styles.slider}
            />
          </label>
        </div>
      )}

      <button onClick={resetFilters} style={styles.reset}>
        Reset All
      </button>
    </aside>
  );
}

const styles: Record<string, React.CSSProperties> = {
  sidebar: {
    width: 240,
    padding: "16px",
    borderRight: "1px solid #e2e8f0",
    background: "#f8fafc",
    overflowY: "auto",
    flexShrink: 0,
  },
  heading: { margin: "0 0 16px", fontSize: 16, color: "#1e293b" },
  subheading: { margin: "0 0 8px", fontSize: 13, color: "#64748b", textTransform: "uppercase" as const, letterSpacing: 1 },
  section: { marginBottom: 20 },
  label: { display: "flex", alignItems: "center", gap: 6, marginBottom: 6, fontSize: 13, cursor: "pointer" },
  checkbox: { accentColor: "#3b82f6" },
  sliderLabel: { display: "flex", flexDirection: "column", gap: 4, marginBottom: 10, fontSize: 13, color: "#334155" },
  slider: { width: "100%", accentColor: "#3b82f6" },
  reset: {
    width: "100%",
    padding: "8px",
    border: "1px solid #cbd5e1",
    borderRadius: 6,
    background: "#fff",
    cursor: "pointer",
    fontSize: 13,
  },
};
