import type { ViewConfig } from "./types";

export const VIEWS: ViewConfig[] = [
  {
    id: "protein",
    title: "Protein Affordability",
    description: "Protein quality against cost per gram of protein, by region.",
    source: import.meta.env.VITE_PROTEIN_DATA_URL || "/data/protein_sources.csv",
    schema: {
      name: { aliases: ["Food", "Food Source", "Protein Source", "Item", "Name"], required: true },
      primary: { aliases: ["Protein Index", "Protein Score", "PDCAAS", "Index"], required: true },
      cost: {
        aliases: ["Cost per gram protein", "Cost per g Protein ($)", "Cost per g", "Cost"],
        required: true,
      },
      category: { aliases: ["Region", "Country", "Market"], required: true },
    },
    labels: {
      name: "Food",
      primary: "Protein Index",
      cost: "Cost per gram protein",
      category: "Region",
      costPrefix: "$",
    },
  },
  {
    id: "food-security",
    title: "Global Food Security",
    description: "Food security indicators by country, region and year.",
    source: import.meta.env.VITE_FOOD_SECURITY_DATA_URL || "/data/food_security.csv",
    schema: {
      name: { aliases: ["Country", "Country Name", "Name"], required: true },
      primary: { aliases: ["GFSI Score", "Overall Score", "Score"], required: true },
      category: { aliases: ["Region", "Continent"], required: true },
      year: { aliases: ["Year"], required: false },
    },
    labels: {
      name: "Country",
      primary: "GFSI Score",
      cost: "Cost",
      category: "Region",
    },
    metrics: [
      {
        id: "gfsi",
        label: "GFSI Score",
        column: { aliases: ["GFSI Score", "Overall Score", "Score"], required: true },
      },
      {
        id: "undernourishment",
        label: "Undernourishment %",
        column: { aliases: ["Undernourishment %", "Undernourishment", "Undernourishment_Percent"], required: true },
      },
      {
        id: "food-insecurity",
        label: "Food Insecurity %",
        column: { aliases: ["Food Insecurity %", "Food Insecurity", "Food_Insecurity_Percent"], required: true },
      },
    ],
  },
];
