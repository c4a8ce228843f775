import type { BaseLogger } from "pino";
import { z } from "zod";

import {
  INTENTS,
  type Intent,
  type IntentClassification,
  type ReasoningStep,
} from "../contracts/chat";
import type { ModelProvider } from "../providers/model_provider";

export const INTENT_SCHEMA_NAME = "intent_classification";

export const INTENT_JSON_SCHEMA = {
  type: "object",
  required: ["intent", "entities"],
  properties: {
    intent: { type: "string", enum: [...INTENTS] },
    entities: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "value"],
        properties: {
          name: { type: "string" },
          value: { type: "string" },
        },
      },
    },
  },
} as const;

const MINUTES_NOUNS = ["회의록", "minutes"];
const MINUTES_VERBS = ["전송", "보내", "공유", "전달", "매터모스트", "send", "share", "mattermost"];
const VISUALIZE_WORDS = ["시각화", "차트", "그래프", "visualize", "visualise", "chart", "graph", "plot"];
const UNSUPPORTED_WORDS = ["날씨", "영화", "주식", "음악", "식당", "weather", "movie", "stock", "music", "restaurant"];

const IntentResponse = z.object({
  intent: z.string(),
  entities: z
    .union([
      z.array(z.object({ name: z.string(), value: z.union([z.string(), z.number()]) })),
      z.record(z.string(), z.union([z.string(), z.number()])),
    ])
    .default([]),
});

const isIntent = (value: string): value is Intent =>
  INTENTS.some((intent) => intent === value);

const findWord = (text: string, words: string[]) => words.find((word) => text.includes(word));

export function classifyByKeywords(query: string): IntentClassification {
  const text = query.toLowerCase();
  const entities: Record<string, string> = {};

  const minutesNoun = findWord(text, MINUTES_NOUNS);
  if (minutesNoun && findWord(text, MINUTES_VERBS)) {
    const match = /회의록\s*(\S+)|(\S+)\s*회의록/.exec(query);
    const meetingRef = match?.[1] ?? match?.[2];
    if (meetingRef) entities.meeting_id = meetingRef;
    return {
      intent: "send_mattermost_minutes",
      entities,
      source: "keywords",
      reasoningSteps: [
        {
          stepDescription: "Keyword-based intent classification",
          details: { reason: "Meeting document sharing keywords detected" },
        },
      ],
    };
  }

  const chartWord = findWord(text, VISUALIZE_WORDS);
  if (chartWord) {
    return {
      intent: "visualize",
      entities,
      source: "keywords",
      reasoningSteps: [
        {
          stepDescription: "Keyword-based intent classification",
          details: { reason: "Visualization keywords detected", keyword: chartWord },
        },
      ],
    };
  }

  if (findWord(text, UNSUPPORTED_WORDS)) {
    return {
      intent: "unsupported",
      entities,
      source: "keywords",
      reasoningSteps: [
        {
          stepDescription: "Keyword-based intent classification",
          details: { reason: "Unsupported feature keywords detected" },
        },
      ],
    };
  }

  return {
    intent: "qna",
    entities,
    source: "keywords",
    reasoningSteps: [
      {
        stepDescription: "Keyword-based intent classification",
        details: { reason: "Default classification for general queries" },
      },
    ],
  };
}

/** Strip a ```json fence some models wrap around their answer. */
export function cleanJsonResponse(raw: string): string {
  let text = raw;
  const fence = text.indexOf("```json");
  if (fence !== -1) text = text.slice(fence + "```json".length);
  const close = text.indexOf("```");
  if (close !== -1) text = text.slice(0, close);
  return text.trim();
}

export function buildIntentPrompt(query: string): string {
  return [
    "You classify the intent of a user's request to a meeting-document assistant and extract key entities.",
    "Answer with JSON only: { \"intent\": <intent>, \"entities\": [{ \"name\": <name>, \"value\": <value> }] }.",
    "",
    "Intents:",
    '- "qna": general questions and questions about meetings or documents.',
    '- "send_mattermost_minutes": send meeting minutes to participants through Mattermost.',
    '  Entities: "document_name", "target_user_or_channel" when stated.',
    '- "visualize": draw a chart or graph from document data.',
    '  Entities: "chart_type" when stated.',
    '- "unsupported": requests the system cannot serve (weather, music, ...).',
    "",
    `Query: ${query}`,
  ].join("\n");
}

function toEntities(raw: z.infer<typeof IntentResponse>["entities"]): Record<string, string> {
  const entities: Record<string, string> = {};
  if (Array.isArray(raw)) {
    for (const entry of raw) entities[entry.name] = String(entry.value);
  } else {
    for (const [name, value] of Object.entries(raw)) entities[name] = String(value);
  }
  return entities;
}

function withFallback(
  query: string,
  steps: ReasoningStep[]
): IntentClassification {
  const fallback = classifyByKeywords(query);
  return { ...fallback, reasoningSteps: [...steps, ...fallback.reasoningSteps] };
}

/**
 * Ask the model for `{ intent, entities }`; any call or parse failure falls
 * back to keyword classification. Never throws.
 */
export async function classifyIntent(args: {
  query: string;
  model: ModelProvider;
  log: BaseLogger;
  signal?: AbortSignal;
}): Promise<IntentClassification> {
  const promptText = buildIntentPrompt(args.query);
  const steps: ReasoningStep[] = [
    {
      stepDescription: "Intent classification and entity extraction prompt prepared",
      details: { prompt_length: promptText.length },
    },
  ];

  let raw: string;
  try {
    raw = await args.model.completeJson({
      promptText,
      schemaName: INTENT_SCHEMA_NAME,
      schema: INTENT_JSON_SCHEMA,
      signal: args.signal,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    args.log.warn({ err, provider: args.model.name }, "intent.model_failed");
    steps.push({ stepDescription: "LLM call error", details: { error: message } });
    return withFallback(args.query, steps);
  }

  steps.push({
    stepDescription: "LLM raw response for intent/entity",
    details: { response_length: raw.length },
  });

  let json: unknown;
  try {
    json = JSON.parse(cleanJsonResponse(raw));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    args.log.warn({ size: raw.length }, "intent.response_unparseable");
    steps.push({ stepDescription: "LLM response JSON parsing error", details: { error: message } });
    return withFallback(args.query, steps);
  }

  const parsed = IntentResponse.safeParse(json);
  if (!parsed.success) {
    steps.push({
      stepDescription: "LLM response JSON parsing error",
      details: { error: parsed.error.issues.map((issue) => issue.message).join("; ") },
    });
    return withFallback(args.query, steps);
  }

  const intent = isIntent(parsed.data.intent) ? parsed.data.intent : "unknown";
  const entities = toEntities(parsed.data.entities);
  steps.push({
    stepDescription: "LLM response parsed successfully",
    details: { parsed_intent: intent, parsed_entities: entities },
  });

  return { intent, entities, source: "model", reasoningSteps: steps };
}
