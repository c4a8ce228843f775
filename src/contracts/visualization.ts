import { z } from "zod";

export const CHART_TYPES = [
  "line",
  "bar",
  "pie",
  "scatter",
  "timeline",
  "heatmap",
  "radar",
  "sunburst",
] as const;

export const ChartSpec = z
  .object({
    chart_type: z.enum(CHART_TYPES),
    title: z.string().min(1),
    labels: z.array(z.string()).min(1),
    series: z
      .array(
        z.object({
          name: z.string().min(1),
          values: z.array(z.number()),
        })
      )
      .min(1),
    explanation: z.string(),
  })
  .superRefine((chart, ctx) => {
    chart.series.forEach((s, index) => {
      if (s.values.length !== chart.labels.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["series", index, "values"],
          message: `series "${s.name}" has ${s.values.length} values for ${chart.labels.length} labels`,
        });
      }
    });
  });

export type ChartSpec = z.infer<typeof ChartSpec>;

export const CHART_SCHEMA_NAME = "chart_spec";

// Strict-mode JSON schema handed to the model; mirrors ChartSpec.
export const CHART_SPEC_JSON_SCHEMA = {
  type: "object",
  required: ["chart_type", "title", "labels", "series", "explanation"],
  properties: {
    chart_type: { type: "string", enum: [...CHART_TYPES] },
    title: { type: "string" },
    labels: { type: "array", items: { type: "string" } },
    series: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "values"],
        properties: {
          name: { type: "string" },
          values: { type: "array", items: { type: "number" } },
        },
      },
    },
    explanation: { type: "string" },
  },
} as const;
