import type { BaseLogger } from "pino";

import type { Envelope } from "../contracts/envelope";
import type { UpstreamSource } from "../contracts/upstream_event";
import { normalizeItem } from "./normalize_event";
import { StreamFilter } from "./stream_filter";
import type { StreamPolicy } from "./stream_policy";

export type StreamOutcome = "completed" | "failed" | "cancelled";

export type StreamSettled = {
  outcome: StreamOutcome;
  answerText: string;
  envelopeCount: number;
};

export type StreamPipelineArgs = {
  sessionId: string;
  source: UpstreamSource;
  policy: StreamPolicy;
  log: BaseLogger;
  onSettled?: (settled: StreamSettled) => Promise<void> | void;
};

/**
 * Normalizer + filter over one upstream source.
 *
 * The generator always closes with exactly one `end`, unless the consumer
 * returns early (client disconnect), in which case the upstream iterator is
 * returned as well and `onSettled` reports "cancelled".
 */
export async function* runStreamPipeline(args: StreamPipelineArgs): AsyncGenerator<Envelope> {
  const { sessionId, log } = args;
  const filter = new StreamFilter({ sessionId, policy: args.policy, log });

  let outcome: StreamOutcome = "cancelled";
  let envelopeCount = 0;

  try {
    let closing: Envelope[];
    try {
      for await (const item of args.source) {
        const envelope = normalizeItem(item, { sessionId, log });
        if (!envelope) continue;

        for (const out of filter.push(envelope)) {
          envelopeCount += 1;
          yield out;
        }
        // nothing after the first end reaches the client; stop pulling
        if (filter.closed) break;
      }
      closing = filter.finish();
    } catch (err) {
      closing = filter.fail(err);
    }

    for (const out of closing) {
      envelopeCount += 1;
      yield out;
    }
    outcome = filter.failed ? "failed" : "completed";
  } finally {
    log.info(
      { sessionId, outcome, envelopeCount, answerChars: filter.answerText.length },
      "stream.settled"
    );
    if (args.onSettled) {
      try {
        await args.onSettled({ outcome, answerText: filter.answerText, envelopeCount });
      } catch (err) {
        log.error({ sessionId, err }, "stream.on_settled_failed");
      }
    }
  }
}
