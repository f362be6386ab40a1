import { useState } from "react";
import { VIEWS } from "./config";
import { DatasetView } from "./components/DatasetView";

export default function App() {
  const [activeId, setActiveId] = useState(VIEWS[0]?.id ?? "");

  // Every view stays mounted so each keeps its own filter state across tab switches.
  return (
    <div style={styles.app}>
      <nav style={styles.tabs}>
        {VIEWS.map((v) => (
          <button
            key={v.id}
            onClick={() => setActiveId(v.id)}
            style={v.id === activeId ? { ...styles.tab, ...styles.activeTab } : styles.tab}
          >
            {v.title}
          </button>
        ))}
      </nav>
      {VIEWS.map((v) => (
        <div key={v.id} style={{ ...styles.panel, display: v.id === activeId ? "flex" : "none" }}>
          <DatasetView view={v} />
        </div>
      ))}
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  app: {
    display: "flex",
    flexDirection: "column",
    height: "100vh",
    fontFamily:
      '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif',
  },
  tabs: {
    display: "flex",
    gap: 4,
    padding: "8px 16px 0",
    borderBottom: "1px solid #e2e8f0",
    background: "#fff",
  },
  tab: {
    padding: "8px 16px",
    border: "none",
    borderBottom: "2px solid transparent",
    background: "transparent",
    cursor: "pointer",
    fontSize: 14,
    color: "#64748b",
  },
  activeTab: { borderBottomColor: "#3b82f6", color: "#0f172a", fontWeight: 600 },
  panel: { flex: 1, minHeight: 0 },
};
