import type { BaseLogger } from "pino";

import {
  DEFAULT_END_MESSAGE,
  buildEnvelope,
  contentEnvelope,
  endEnvelope,
  readStepDescription,
  type Envelope,
} from "../contracts/envelope";
import type { StreamPolicy } from "./stream_policy";
import {
  ThinkingSegmenter,
  containsSentinelPair,
  indexOfSentinel,
  type Segment,
} from "./thinking_segmenter";

/**
 * Stream Filter & Deduplicator.
 *
 * Stateful policy over normalized envelopes:
 * - merges sentinel-delimited thinking into one envelope (carried across chunks)
 * - holds whitespace-only content until the next visible content; drops
 *   suppressed reasoning steps and echoed full answers
 * - forwards exactly one `end`, synthesizing it after errors
 * - inserts the fallback message when nothing substantive was forwarded
 *
 * Each call returns the envelopes to deliver, in order.
 */
export class StreamFilter {
  private endSent = false;
  private errorSent = false;
  private substantive = 0;
  private answer = "";
  private pendingBlank = "";
  private readonly segmenter: ThinkingSegmenter;

  constructor(
    private readonly args: {
      sessionId: string;
      policy: StreamPolicy;
      log: BaseLogger;
    }
  ) {
    this.segmenter = new ThinkingSegmenter(args.policy.sentinels);
  }

  get closed(): boolean {
    return this.endSent;
  }

  get failed(): boolean {
    return this.errorSent;
  }

  /** Content forwarded so far, fallback excluded. */
  get answerText(): string {
    return this.answer;
  }

  push(envelope: Envelope): Envelope[] {
    if (this.endSent) {
      this.args.log.debug(
        { sessionId: this.args.sessionId, kind: envelope.kind },
        "stream.end_swallowed"
      );
      return [];
    }

    switch (envelope.kind) {
      case "end": {
        const message = envelope.payload?.message;
        return this.close(typeof message === "string" && message ? message : DEFAULT_END_MESSAGE);
      }
      case "error":
        return this.closeWithError(envelope);
      case "content":
        return this.pushContent(envelope.text ?? "");
      case "thinking":
        return this.pushThinking(envelope);
      default:
        return this.emit(envelope);
    }
  }

  /** Upstream completed without an `end`. */
  finish(): Envelope[] {
    if (this.endSent) return [];
    return this.close(DEFAULT_END_MESSAGE);
  }

  /** Upstream raised. */
  fail(err: unknown): Envelope[] {
    if (this.endSent) {
      this.args.log.warn({ sessionId: this.args.sessionId, err }, "stream.error_after_end");
      return [];
    }

    this.args.log.error({ sessionId: this.args.sessionId, err }, "stream.upstream_failed");

    const message =
      err instanceof Error && err.message.trim() ? err.message : this.args.policy.errorMessage;
    const stack = err instanceof Error ? err.stack : undefined;

    return this.closeWithError(
      buildEnvelope({
        kind: "error",
        sessionId: this.args.sessionId,
        payload: { message, ...(stack ? { details: stack } : {}) },
      })
    );
  }

  private pushContent(text: string): Envelope[] {
    const { policy } = this.args;
    if (
      this.segmenter.state === "idle" &&
      text.length >= policy.duplicateDumpMinLength &&
      containsSentinelPair(text, policy.sentinels)
    ) {
      this.args.log.debug(
        { sessionId: this.args.sessionId, size: text.length },
        "stream.duplicate_dump_dropped"
      );
      return [];
    }
    return this.fromSegments(this.segmenter.feed(text));
  }

  private pushThinking(envelope: Envelope): Envelope[] {
    const text = envelope.text;
    if (text === undefined || text === "") {
      // status step, e.g. "Searching documents"
      return this.emit(envelope);
    }

    if (
      this.segmenter.state === "in_thinking" ||
      indexOfSentinel(text, this.args.policy.sentinels.open) !== -1
    ) {
      return this.fromSegments(this.segmenter.feed(text));
    }

    // A sentinel-free thinking text is itself one complete segment.
    return [
      ...this.fromSegments(this.segmenter.flush()),
      ...this.thinkingSegment(text),
    ];
  }

  private fromSegments(segments: Segment[]): Envelope[] {
    const out: Envelope[] = [];
    for (const segment of segments) {
      if (segment.kind === "text") {
        out.push(...this.emit(contentEnvelope(this.args.sessionId, segment.text)));
      } else {
        if (!segment.closed) {
          this.args.log.debug({ sessionId: this.args.sessionId }, "stream.thinking_unterminated");
        }
        out.push(...this.thinkingSegment(segment.text));
      }
    }
    return out;
  }

  private thinkingSegment(inner: string): Envelope[] {
    const { policy, sessionId } = this.args;
    const reasoning = inner.trim();
    if (!reasoning) return [];

    if (policy.thinkingOutput === "content") {
      return this.emit(
        contentEnvelope(sessionId, `${policy.sentinels.open}${inner}${policy.sentinels.close}`)
      );
    }

    return this.emit(
      buildEnvelope({
        kind: "reasoning_step",
        sessionId,
        text: reasoning,
        payload: {
          step_description: policy.thinkingStepDescription,
          details: { reasoning },
        },
      })
    );
  }

  private emit(envelope: Envelope): Envelope[] {
    if (envelope.kind === "content") {
      const raw = envelope.text ?? "";
      if (!raw.trim()) {
        // "\n\n" and " " deltas ride along with the next visible text
        this.pendingBlank += raw;
        return [];
      }
      const text = this.pendingBlank + raw;
      this.pendingBlank = "";
      this.substantive += 1;
      this.answer += text;
      return [text === raw ? envelope : contentEnvelope(this.args.sessionId, text)];
    }

    if (envelope.kind === "reasoning_step") {
      const step = readStepDescription(envelope);
      if (step !== undefined && this.args.policy.suppressedReasoningSteps.has(step)) {
        return [];
      }
      this.substantive += 1;
    }

    return [envelope];
  }

  private close(message: string): Envelope[] {
    const { sessionId, policy } = this.args;
    const out = this.fromSegments(this.segmenter.flush());
    this.pendingBlank = "";
    if (this.substantive === 0) {
      out.push(contentEnvelope(sessionId, policy.fallbackMessage));
    }
    out.push(endEnvelope(sessionId, message));
    this.endSent = true;
    return out;
  }

  private closeWithError(error: Envelope): Envelope[] {
    const { sessionId, policy } = this.args;
    const out = this.fromSegments(this.segmenter.flush());
    this.pendingBlank = "";

    const rawMessage = error.payload?.message;
    const details = error.payload?.details;
    out.push(
      buildEnvelope({
        kind: "error",
        sessionId,
        payload: {
          message: typeof rawMessage === "string" && rawMessage.trim() ? rawMessage : policy.errorMessage,
          is_final: true,
          ...(policy.exposeErrorDetails && details !== undefined ? { details } : {}),
        },
      })
    );
    out.push(endEnvelope(sessionId));

    this.errorSent = true;
    this.endSent = true;
    return out;
  }
}
