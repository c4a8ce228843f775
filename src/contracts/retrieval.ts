import { z } from "zod";

export type RetrievedDocument = {
  documentId: string;
  contentChunk: string;
  score: number;
  metadata: Record<string, unknown>;
};

/** Wire shape of one document inside `retrieved_document(s)` envelopes. */
export type RetrievedDocumentPayload = {
  document_id: string;
  content_chunk: string;
  score: number;
  metadata: Record<string, unknown>;
};

export const toDocumentPayload = (doc: RetrievedDocument): RetrievedDocumentPayload => ({
  document_id: doc.documentId,
  content_chunk: doc.contentChunk,
  score: doc.score,
  metadata: doc.metadata,
});

// Accepts both the camelCase form we produce and the snake_case forms seen on the wire.
export const RetrievedDocumentLike = z
  .object({
    documentId: z.string().optional(),
    document_id: z.string().optional(),
    source_document_id: z.string().optional(),
    contentChunk: z.string().optional(),
    content_chunk: z.string().optional(),
    page_content: z.string().optional(),
    score: z.number().optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .transform((raw, ctx): RetrievedDocument => {
    const documentId = raw.documentId ?? raw.document_id ?? raw.source_document_id;
    const contentChunk = raw.contentChunk ?? raw.content_chunk ?? raw.page_content;
    if (documentId === undefined || contentChunk === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "document requires an id and a content chunk",
      });
      return z.NEVER;
    }
    return {
      documentId,
      contentChunk,
      score: raw.score ?? 0,
      metadata: raw.metadata ?? {},
    };
  });
