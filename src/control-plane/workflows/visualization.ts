import type { UpstreamEvent } from "../../contracts/upstream_event";
import { CHART_SCHEMA_NAME, CHART_SPEC_JSON_SCHEMA, ChartSpec } from "../../contracts/visualization";
import { cleanJsonResponse } from "../intent";
import { buildChartPromptPack, promptPackLogShape, toSinglePromptText } from "../prompt_pack";
import { findRelevantDocuments } from "./documents";
import type { WorkflowContext } from "./types";

export const VISUALIZATION_TASK = "visualization_created";

export class VisualizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VisualizationError";
  }
}

export function parseChartSpec(raw: string): ChartSpec {
  let json: unknown;
  try {
    json = JSON.parse(cleanJsonResponse(raw));
  } catch {
    throw new VisualizationError("Chart specification is not valid JSON");
  }

  const parsed = ChartSpec.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new VisualizationError(`Invalid chart specification: ${issues}`);
  }
  return parsed.data;
}

/** Chart from document data. An unusable chart spec throws; the pipeline reports it. */
export async function* visualizationWorkflow(ctx: WorkflowContext): AsyncGenerator<UpstreamEvent> {
  const documents = yield* findRelevantDocuments(ctx);

  const pack = buildChartPromptPack({ query: ctx.request.query, documents });
  ctx.log.info({ sessionId: ctx.sessionId, promptPack: promptPackLogShape(pack) }, "visualization.prompt_built");

  yield { type: "thinking", stepDescription: "Building chart specification" };

  const raw = await ctx.services.model.completeJson({
    promptText: toSinglePromptText(pack),
    schemaName: CHART_SCHEMA_NAME,
    schema: CHART_SPEC_JSON_SCHEMA,
    signal: ctx.signal,
  });
  const chart = parseChartSpec(raw);

  yield { type: "visualization", chart };
  if (chart.explanation.trim()) {
    yield { type: "text", text: chart.explanation };
  }
  yield {
    type: "task_complete",
    task: VISUALIZATION_TASK,
    details: { chart_type: chart.chart_type, series_count: chart.series.length },
  };
}
