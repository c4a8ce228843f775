import { z } from "zod";

const MeetingContextInput = z
  .object({
    title: z.string().min(1).optional(),
    participant_names: z.array(z.string()).optional(),
    minutes_url: z.string().min(1).optional(),
    // Field names used by the meeting hub client.
    hub_meeting_title: z.string().min(1).optional(),
    hub_participant_names: z.array(z.string()).optional(),
    hub_minutes_s3_url: z.string().min(1).optional(),
  })
  .transform((raw): MeetingContext => ({
    title: raw.title ?? raw.hub_meeting_title,
    participantNames: raw.participant_names ?? raw.hub_participant_names,
    minutesUrl: raw.minutes_url ?? raw.hub_minutes_s3_url,
  }));

// Every field may be missing; workflows report what they lack.
export type MeetingContext = {
  title?: string;
  participantNames?: string[];
  minutesUrl?: string;
};

export const ChatRequest = z.object({
  query: z.string().trim().min(1).max(20_000),
  session_id: z.string().trim().min(1).optional(),
  search_in_meeting_documents_only: z.boolean().default(false),
  target_document_ids: z.array(z.string().min(1)).optional(),
  meeting_context: MeetingContextInput.optional(),
});

export type ChatRequest = z.output<typeof ChatRequest>;

export const INTENTS = [
  "qna",
  "send_mattermost_minutes",
  "visualize",
  "unsupported",
  "unknown",
] as const;

export type Intent = (typeof INTENTS)[number];

export type ReasoningStep = {
  stepDescription: string;
  details?: Record<string, unknown>;
};

export type IntentClassification = {
  intent: Intent;
  entities: Record<string, string>;
  source: "model" | "keywords";
  reasoningSteps: ReasoningStep[];
};
