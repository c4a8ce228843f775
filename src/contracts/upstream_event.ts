import type { Intent } from "./chat";
import type { RetrievedDocument } from "./retrieval";
import type { ChartSpec } from "./visualization";

/**
 * Raw events produced by workflows and model providers before normalization.
 *
 * `other` carries anything the normalizer could lift into a record but whose
 * type it does not recognise.
 */
export type UpstreamEvent =
  | { type: "start" }
  | { type: "text"; text: string }
  | {
      type: "thinking";
      text?: string;
      stepDescription?: string;
      details?: Record<string, unknown>;
    }
  | { type: "reasoning_step"; stepDescription: string; details?: Record<string, unknown> }
  | { type: "retrieved_document"; document: RetrievedDocument }
  | { type: "retrieved_documents"; documents: RetrievedDocument[] }
  | {
      type: "intent_classified";
      intent: Intent;
      entities: Record<string, string>;
      description: string;
    }
  | { type: "task_complete"; task: string; details?: Record<string, unknown> }
  | { type: "result"; success: boolean; message: string; partial?: boolean }
  | { type: "visualization"; chart: ChartSpec }
  | { type: "warning"; message: string; details?: Record<string, unknown> }
  | { type: "error"; message: string; details?: string }
  | { type: "end"; message?: string }
  | { type: "ping" }
  | { type: "other"; rawType: string; raw: unknown };

export type UpstreamEventType = UpstreamEvent["type"];

/** Anything an upstream source may yield: typed events, bare text, or loose records. */
export type UpstreamItem = UpstreamEvent | string | Record<string, unknown>;

export type UpstreamSource = AsyncIterable<UpstreamItem>;
