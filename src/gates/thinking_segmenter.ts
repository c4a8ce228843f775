export type Sentinels = { open: string; close: string };

export type Segment =
  | { kind: "text"; text: string }
  | { kind: "thinking"; text: string; closed: boolean };

export type SegmenterState = "idle" | "in_thinking";

// Case-insensitive search that keeps indices aligned with the original string.
export function indexOfSentinel(haystack: string, sentinel: string, from = 0): number {
  const needle = sentinel.toLowerCase();
  const last = haystack.length - sentinel.length;
  for (let i = from; i <= last; i++) {
    if (haystack.slice(i, i + sentinel.length).toLowerCase() === needle) {
      return i;
    }
  }
  return -1;
}

/** Length of the longest proper prefix of `sentinel` that `text` ends with. */
export function partialSentinelSuffix(text: string, sentinel: string): number {
  const max = Math.min(sentinel.length - 1, text.length);
  for (let k = max; k > 0; k--) {
    if (text.slice(text.length - k).toLowerCase() === sentinel.slice(0, k).toLowerCase()) {
      return k;
    }
  }
  return 0;
}

export function containsSentinelPair(text: string, sentinels: Sentinels): boolean {
  const open = indexOfSentinel(text, sentinels.open);
  return open !== -1 && indexOfSentinel(text, sentinels.close, open + sentinels.open.length) !== -1;
}

/**
 * Incremental splitter for text with inline `<open>…<close>` reasoning blocks.
 *
 * Only a possible partial sentinel (at most `sentinel.length - 1` chars) is
 * carried between feeds; settled text leaves immediately, and the inner text
 * of an open block accumulates until the close sentinel or `flush()`.
 */
export class ThinkingSegmenter {
  private mode: SegmenterState = "idle";
  private carry = "";
  private inner = "";

  constructor(private readonly sentinels: Sentinels) {}

  get state(): SegmenterState {
    return this.mode;
  }

  feed(chunk: string): Segment[] {
    const out: Segment[] = [];
    let buffer = this.carry + chunk;
    this.carry = "";

    for (;;) {
      const sentinel = this.mode === "idle" ? this.sentinels.open : this.sentinels.close;
      const index = indexOfSentinel(buffer, sentinel);

      if (index === -1) {
        const hold = partialSentinelSuffix(buffer, sentinel);
        const settled = buffer.slice(0, buffer.length - hold);
        this.carry = buffer.slice(buffer.length - hold);
        if (this.mode === "idle") {
          if (settled) out.push({ kind: "text", text: settled });
        } else {
          this.inner += settled;
        }
        return out;
      }

      const before = buffer.slice(0, index);
      buffer = buffer.slice(index + sentinel.length);

      if (this.mode === "idle") {
        if (before) out.push({ kind: "text", text: before });
        this.mode = "in_thinking";
        this.inner = "";
      } else {
        out.push({ kind: "thinking", text: this.inner + before, closed: true });
        this.inner = "";
        this.mode = "idle";
      }
    }
  }

  /** Release whatever is held; an unterminated block comes back with `closed: false`. */
  flush(): Segment[] {
    const out: Segment[] = [];
    if (this.mode === "in_thinking") {
      out.push({ kind: "thinking", text: this.inner + this.carry, closed: false });
    } else if (this.carry) {
      out.push({ kind: "text", text: this.carry });
    }
    this.mode = "idle";
    this.carry = "";
    this.inner = "";
    return out;
  }
}
