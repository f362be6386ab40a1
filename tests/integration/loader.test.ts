import { afterEach, describe, expect, it, vi } from "vitest";
import * as XLSX from "xlsx";
import {
  fileExtension,
  loadDataset,
  loadRows,
  toDataset,
  type FetchFn,
} from "../../dashboard/src/lib/loader";
import { VIEWS } from "../../dashboard/src/config";
import { defaultCriteria } from "../../dashboard/src/lib/defaults";
import { filterRecords } from "../../dashboard/src/lib/filter";
import { schemaFor } from "../../dashboard/src/lib/views";
import { EMPTY_DATASET } from "../../dashboard/src/lib/dataset";
import { SCHEMA } from "../fixtures";

const CSV_HEADER = "Food Source,Protein Index,Cost per g Protein ($),Region";

const serving = (body: BodyInit, status = 200) => {
  const fetchFn = vi.fn<FetchFn>(async () => new Response(body, { status }));
  return fetchFn;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadDataset", () => {
  it("loads a CSV file through the column aliases", async () => {
    const fetchFn = serving(`${CSV_HEADER}\nLentils,78,0.40,Asia\nMilk,50,0.60,Europe\n`);
    const res = await loadDataset("/data/protein.csv", SCHEMA, fetchFn);

    expect(fetchFn).toHaveBeenCalledWith("/data/protein.csv");
    expect(res.error).toBeNull();
    expect(res.dropped).toBe(0);
    expect(res.dataset).toEqual({
      hasCost: true,
      records: [
        { name: "Lentils", primaryMetric: 78, costMetric: 0.4, category: "Asia" },
        { name: "Milk", primaryMetric: 50, costMetric: 0.6, category: "Europe" },
      ],
    });
  });

  it("drops and reports rows with non-numeric values", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchFn = serving(`${CSV_HEADER}\nLentils,78,0.40,Asia\nOats,unknown,0.30,Europe\n`);
    const res = await loadDataset("/data/protein.csv", SCHEMA, fetchFn);

    expect(res.error).toBeNull();
    expect(res.dropped).toBe(1);
    expect(res.dataset.records.map((r) => r.name)).toEqual(["Lentils"]);
    expect(warn).toHaveBeenCalledWith(
      "/data/protein.csv: dropped 1 row(s) with missing or non-numeric values"
    );
  });

  it("returns an empty dataset and the reason on an HTTP failure", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await loadDataset("/data/missing.csv", SCHEMA, serving("not found", 404));

    expect(res).toEqual({
      dataset: EMPTY_DATASET,
      error: "Failed to load /data/missing.csv: HTTP 404",
      dropped: 0,
    });
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("reports a missing required column", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchFn = serving("Food Source,Protein Index,Cost per g Protein ($)\nLentils,78,0.40\n");
    const res = await loadDataset("/data/protein.csv", SCHEMA, fetchFn);

    expect(res.dataset).toBe(EMPTY_DATASET);
    expect(res.error).toBe(
      'Failed to load /data/protein.csv: missing required column "category" (tried: Region)'
    );
  });

  it("reports a network failure without rejecting", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchFn: FetchFn = () => Promise.reject(new TypeError("fetch failed"));
    const res = await loadDataset("/data/protein.csv", SCHEMA, fetchFn);

    expect(res.dataset.records).toEqual([]);
    expect(res.error).toBe("Failed to load /data/protein.csv: fetch failed");
  });

  it("refuses unsupported file types before fetching", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchFn = serving("");
    const res = await loadDataset("/data/protein.txt", SCHEMA, fetchFn);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(res.error).toBe('Failed to load /data/protein.txt: unsupported file type ".txt"');
  });

  it("loads JSON rows", async () => {
    const rows = [{ Food: "Egg", "Protein Index": 88, "Cost per gram protein": 0.45, Region: "US" }];
    const res = await loadDataset("/data/protein.json?v=2", SCHEMA, serving(JSON.stringify(rows)));

    expect(res.error).toBeNull();
    expect(res.dataset.records).toEqual([
      { name: "Egg", primaryMetric: 88, costMetric: 0.45, category: "US" },
    ]);
  });

  it("rejects JSON that is not a list of rows", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await loadDataset("/data/protein.json", SCHEMA, serving('{"rows": []}'));

    expect(res.error).toBe("Failed to load /data/protein.json: JSON data must be an array of rows");
  });

  it("loads the first sheet of a workbook", async () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["Food", "Protein Index", "Cost per gram protein", "Region"],
      ["Soy", 92, 0.5, "Asia"],
      ["Egg", 88, 0.45, "US"],
    ]);
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, sheet, "Sources");
    const buffer: ArrayBuffer = XLSX.write(wb, { type: "array", bookType: "xlsx" });

    const res = await loadDataset("/data/protein.xlsx", SCHEMA, serving(buffer));

    expect(res.error).toBeNull();
    expect(res.dataset.records).toEqual([
      { name: "Soy", primaryMetric: 92, costMetric: 0.5, category: "Asia" },
      { name: "Egg", primaryMetric: 88, costMetric: 0.45, category: "US" },
    ]);
  });
});

describe("loadRows and toDataset", () => {
  const FOOD_CSV = [
    "Country,Region,Year,GFSI Score,Undernourishment %,Food Insecurity %",
    "Finland,Europe,2022,83.1,2.5,3.9",
    "Finland,Europe,2023,83.7,2.5,3.6",
    "Kenya,Africa,2023,48.3,26.8,67.5",
    "",
  ].join("\n");
  const foodView = VIEWS[1];

  it("rebuilds one set of rows for each metric", async () => {
    const fetchFn = serving(FOOD_CSV);
    const { rows, error } = await loadRows("/data/food.csv", fetchFn);
    expect(error).toBeNull();

    const score = toDataset("/data/food.csv", rows, schemaFor(foodView, "gfsi")).dataset;
    const insecurity = toDataset("/data/food.csv", rows, schemaFor(foodView, "food-insecurity")).dataset;

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(score.hasCost).toBe(false);
    expect(score.records.map((r) => r.primaryMetric)).toEqual([83.1, 83.7, 48.3]);
    expect(insecurity.records.map((r) => r.primaryMetric)).toEqual([3.9, 3.6, 67.5]);
    expect(insecurity.records.map((r) => r.year)).toEqual([2022, 2023, 2023]);
  });

  it("opens the food view on its latest year", async () => {
    const { rows } = await loadRows("/data/food.csv", serving(FOOD_CSV));
    const { dataset } = toDataset("/data/food.csv", rows, schemaFor(foodView, "gfsi"));
    const criteria = defaultCriteria(dataset);

    expect(criteria.year).toBe(2023);
    expect(filterRecords(dataset, criteria).map((r) => r.primaryMetric)).toEqual([83.7, 48.3]);
  });

  it("reports a fetch failure as rows and a reason", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await loadRows("/data/food.csv", serving("gone", 500));

    expect(res).toEqual({ rows: [], error: "Failed to load /data/food.csv: HTTP 500" });
  });
});

describe("fileExtension", () => {
  it("ignores query strings and fragments", () => {
    expect(fileExtension("/data/scores.XLSX?v=3#top")).toBe("xlsx");
    expect(fileExtension("/data/scores")).toBe("");
  });
});
