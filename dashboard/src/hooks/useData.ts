import { useState, useEffect, useMemo } from "react";
import type { LoadResult, RowsResult, ViewConfig } from "../types";
import { EMPTY_DATASET } from "../lib/dataset";
import { loadRows, toDataset } from "../lib/loader";
import { schemaFor } from "../lib/views";

/**
 * Loads a view's file once and rebuilds its dataset for the chosen metric,
 * so switching metrics never refetches.
 */
export function useData(view: ViewConfig, metricId: string | null) {
  const [raw, setRaw] = useState<RowsResult>({ rows: [], error: null });
  const [loading, setLoading] = useState(true);

  useEffect(() => {
    let alive = true;
    setLoading(true);

    loadRows(view.source)
      .then((res) => {
        if (!alive) return;
        setRaw(res);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (!alive) return;
        setRaw({ rows: [], error: err instanceof Error ? err.message : String(err) });
        setLoading(false);
      });

    return () => {
      alive = false;
    };
  }, [view.source]);

  const { dataset, error, dropped }: LoadResult = useMemo(
    () =>
      raw.error !== null
        ? { dataset: EMPTY_DATASET, error: raw.error, dropped: 0 }
        : toDataset(view.source, raw.rows, schemaFor(view, metricId)),
    [raw, view, metricId]
  );

  return { dataset, loading, error, dropped };
}
