import type { MeetingContext } from "../contracts/chat";
import type { RetrievedDocument } from "../contracts/retrieval";
import type { ConversationEntry } from "../store/conversation_store";

/**
 * PromptPack is the deterministic layout of every model call: ordered
 * sections rendered into one prompt, with the user query always last so
 * providers (and the fake model) can find it.
 */

export type PromptSectionId =
  | "instructions"
  | "history"
  | "meeting_context"
  | "documents"
  | "query";

export type PromptSection = {
  id: PromptSectionId;
  title: string;
  content: string;
};

export type PromptPack = {
  version: "prompt-pack-v1";
  task: "qna" | "chart";
  sections: PromptSection[];
  usedDocumentIds: string[];
};

export const HISTORY_ENTRY_MAX_CHARS = 200;

const QNA_INSTRUCTIONS = [
  "You answer questions about the user's meetings and documents.",
  "Before answering, describe step by step how you will approach the question inside <think></think> tags.",
  "Write the reasoning inside the tags in English. Then give the answer after the closing tag.",
  "Base the answer on the documents below when they are relevant and cite their titles.",
  "If the documents do not contain the answer, say so plainly. Do not fabricate facts.",
].join("\n");

const CHART_INSTRUCTIONS = [
  "You turn data from the documents below into one chart specification.",
  "Pick the chart type that fits the data: line, bar, pie, scatter, timeline, heatmap, radar or sunburst.",
  "Every series needs exactly one value per label. Explain the chart in one or two sentences.",
  "Answer with JSON only.",
].join("\n");

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatHistory(history: ConversationEntry[]): string {
  if (history.length === 0) return "(no earlier conversation)";
  return history
    .map((entry) => `${entry.role}: ${truncate(entry.content, HISTORY_ENTRY_MAX_CHARS)}`)
    .join("\n");
}

export function formatMeetingContext(context: MeetingContext | undefined): string {
  if (!context) return "(no meeting selected)";
  const lines: string[] = [];
  if (context.title) lines.push(`title: ${context.title}`);
  if (context.participantNames && context.participantNames.length > 0) {
    lines.push(`participants: ${context.participantNames.join(", ")}`);
  }
  if (context.minutesUrl) lines.push(`minutes_url: ${context.minutesUrl}`);
  return lines.length > 0 ? lines.join("\n") : "(no meeting details)";
}

export function formatDocuments(documents: RetrievedDocument[]): string {
  if (documents.length === 0) return "(no relevant documents)";
  return documents
    .map((doc, index) => {
      const title = typeof doc.metadata.title === "string" ? doc.metadata.title : doc.documentId;
      return [
        `[${index + 1}] ${title} (id: ${doc.documentId}, score: ${doc.score.toFixed(2)})`,
        doc.contentChunk,
      ].join("\n");
    })
    .join("\n\n");
}

export function buildQnaPromptPack(args: {
  query: string;
  history: ConversationEntry[];
  meetingContext?: MeetingContext;
  documents: RetrievedDocument[];
}): PromptPack {
  return {
    version: "prompt-pack-v1",
    task: "qna",
    sections: [
      { id: "instructions", title: "Instructions", content: QNA_INSTRUCTIONS },
      { id: "history", title: "Conversation so far", content: formatHistory(args.history) },
      {
        id: "meeting_context",
        title: "Current meeting",
        content: formatMeetingContext(args.meetingContext),
      },
      { id: "documents", title: "Documents", content: formatDocuments(args.documents) },
      { id: "query", title: "Question", content: `Query: ${args.query}` },
    ],
    usedDocumentIds: args.documents.map((doc) => doc.documentId),
  };
}

export function buildChartPromptPack(args: {
  query: string;
  documents: RetrievedDocument[];
}): PromptPack {
  return {
    version: "prompt-pack-v1",
    task: "chart",
    sections: [
      { id: "instructions", title: "Instructions", content: CHART_INSTRUCTIONS },
      { id: "documents", title: "Documents", content: formatDocuments(args.documents) },
      { id: "query", title: "Request", content: `Query: ${args.query}` },
    ],
    usedDocumentIds: args.documents.map((doc) => doc.documentId),
  };
}

export function toSinglePromptText(pack: PromptPack): string {
  return pack.sections.map((section) => `## ${section.title}\n${section.content}`).join("\n\n");
}

// Sizes only; prompt text never goes to the logs.
export function promptPackLogShape(pack: PromptPack) {
  return {
    version: pack.version,
    task: pack.task,
    sections: pack.sections.map((section) => ({ id: section.id, chars: section.content.length })),
    usedDocumentIds: pack.usedDocumentIds,
  };
}
