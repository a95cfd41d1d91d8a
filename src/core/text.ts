// Byte-bounded text helpers shared by the inventory and the failure-log path.

export type TruncateResult = {
  text: string;
  truncated: boolean;
};

const REPLACEMENT_CHAR = "\uFFFD";

/**
 * Keep the trailing `maxBytes` UTF-8 bytes of `text`. A character split by the
 * cut is dropped rather than rendered as a replacement character.
 */
export function truncateTail(text: string, maxBytes: number): TruncateResult {
  const buffer = Buffer.from(text, "utf8");
  if (buffer.length <= maxBytes) {
    return { text, truncated: false };
  }

  let tail = buffer.subarray(buffer.length - Math.max(0, maxBytes)).toString("utf8");
  while (tail.startsWith(REPLACEMENT_CHAR)) {
    tail = tail.slice(1);
  }
  return { text: tail, truncated: true };
}

/** Decode bytes as UTF-8, substituting malformed sequences instead of failing. */
export function decodeLenient(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(bytes);
}
