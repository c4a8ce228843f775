import type { BaseLogger } from "pino";
import { z } from "zod";

import type { RetrievedDocument } from "../contracts/retrieval";

export type SearchArgs = {
  query: string;
  topK: number;
  meetingDocumentsOnly?: boolean;
  documentIds?: string[];
};

export interface RetrievalClient {
  search(args: SearchArgs): Promise<RetrievedDocument[]>;
}

export class RetrievalError extends Error {
  statusCode?: number;

  constructor(message: string, args: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: args.cause });
    this.name = "RetrievalError";
    this.statusCode = args.statusCode;
  }
}

const SearchResponse = z.object({
  results: z
    .array(
      z.object({
        page_content: z.string().default(""),
        score: z.number().default(0),
        metadata: z
          .object({
            doc_id: z.string().optional(),
            doc_name: z.string().optional(),
            source: z.string().optional(),
          })
          .passthrough()
          .default({}),
      })
    )
    .default([]),
});

export const SEARCH_PATH = "/search/hybrid-reranked";
export const SEARCH_INDICES = ["master_documents"];

/** Hybrid search with cross-encoder reranking on the document search service. */
export class HttpRetrievalClient implements RetrievalClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: {
      baseUrl: string;
      timeoutMs?: number;
      fetchImpl?: typeof fetch;
      log?: BaseLogger;
    }
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(args: SearchArgs): Promise<RetrievedDocument[]> {
    const filter: Record<string, unknown> = {};
    if (args.documentIds && args.documentIds.length > 0) {
      filter.document_ids = args.documentIds;
    }
    if (args.meetingDocumentsOnly) {
      filter.document_type = "meeting";
    }

    const payload = {
      query: args.query,
      top_k: args.topK,
      indices: SEARCH_INDICES,
      ...(Object.keys(filter).length > 0 ? { filter } : {}),
    };
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}${SEARCH_PATH}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
      });
    } catch (err) {
      throw new RetrievalError("Document search request failed", { cause: err });
    }

    if (!res.ok) {
      const body = await res.text();
      this.options.log?.error(
        { statusCode: res.status, bodySnippet: body.slice(0, 500) },
        "retrieval.request_failed"
      );
      throw new RetrievalError(`Document search failed with status ${res.status}`, {
        statusCode: res.status,
      });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new RetrievalError("Document search returned invalid JSON", { cause: err });
    }

    const parsed = SearchResponse.safeParse(json);
    if (!parsed.success) {
      throw new RetrievalError("Document search returned an unexpected shape", {
        cause: parsed.error,
      });
    }

    const documents = parsed.data.results.map((item): RetrievedDocument => {
      const metadata: Record<string, unknown> = {};
      if (item.metadata.doc_name) metadata.title = item.metadata.doc_name;
      if (item.metadata.source) metadata.source = item.metadata.source;
      return {
        documentId: item.metadata.doc_id ?? "unknown_doc_id",
        contentChunk: item.page_content,
        score: item.score,
        metadata,
      };
    });

    this.options.log?.info(
      { resultCount: documents.length, topK: args.topK, filtered: "filter" in payload },
      "retrieval.search_completed"
    );
    return documents;
  }
}

/** Fixed results; an empty instance stands in when no search service is configured. */
export class StaticRetrievalClient implements RetrievalClient {
  readonly calls: SearchArgs[] = [];

  constructor(
    private readonly documents: RetrievedDocument[] = [],
    private readonly failWith?: string
  ) {}

  async search(args: SearchArgs): Promise<RetrievedDocument[]> {
    this.calls.push(args);
    if (this.failWith) throw new RetrievalError(this.failWith);
    return this.documents.slice(0, args.topK);
  }
}
