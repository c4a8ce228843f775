import type { RetrievedDocument } from "../../contracts/retrieval";
import type { UpstreamEvent } from "../../contracts/upstream_event";
import type { WorkflowContext } from "./types";

export const SEARCH_FAILED_MESSAGE = "Document search failed; continuing without documents.";

/**
 * Search, keep documents at or above the minimum score (at most
 * `maxDocuments`), and announce each one. A failed search becomes a warning.
 */
export async function* findRelevantDocuments(
  ctx: WorkflowContext
): AsyncGenerator<UpstreamEvent, RetrievedDocument[]> {
  const { request, services, log } = ctx;
  const { settings } = services;

  yield {
    type: "thinking",
    stepDescription: "Searching documents",
    details: {
      search_in_meeting_documents_only: request.search_in_meeting_documents_only,
      target_document_ids: request.target_document_ids ?? null,
    },
  };

  let found: RetrievedDocument[];
  try {
    found = await services.retrieval.search({
      query: request.query,
      topK: settings.topK,
      meetingDocumentsOnly: request.search_in_meeting_documents_only,
      documentIds: request.target_document_ids,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn({ err, sessionId: ctx.sessionId }, "retrieval.search_failed");
    yield { type: "warning", message: SEARCH_FAILED_MESSAGE, details: { reason } };
    return [];
  }

  yield {
    type: "thinking",
    stepDescription: `Document search complete: ${found.length} documents received`,
  };

  const relevant = found
    .filter((doc) => doc.score >= settings.minScore)
    .slice(0, settings.maxDocuments);

  log.info(
    {
      sessionId: ctx.sessionId,
      originalCount: found.length,
      usedCount: relevant.length,
      scores: relevant.map((doc) => doc.score),
    },
    "retrieval.documents_selected"
  );

  for (const document of relevant) {
    yield { type: "retrieved_document", document };
  }
  return relevant;
}
