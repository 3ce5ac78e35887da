// src/event-stream.ts

export type TaskEvent =
  | { type: "progress"; progress?: number; raw: Record<string, unknown> }
  | { type: "done"; raw: Record<string, unknown> }
  | { type: "error"; message: string; raw: Record<string, unknown> }
  | { type: "other"; raw: Record<string, unknown> };

/**
 * Split a byte stream into text lines (LF or CRLF). A trailing line without
 * a newline is still emitted when the stream ends.
 */
export async function* textLines(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buf = "";
  for await (const chunk of chunks) {
    buf += decoder.decode(chunk, { stream: true });
    let nl = buf.indexOf("\n");
    while (nl !== -1) {
      const line = buf.slice(0, nl);
      buf = buf.slice(nl + 1);
      yield line.endsWith("\r") ? line.slice(0, -1) : line;
      nl = buf.indexOf("\n");
    }
  }
  buf += decoder.decode();
  if (buf) yield buf.endsWith("\r") ? buf.slice(0, -1) : buf;
}

/**
 * Payloads of `data:` lines that parse as JSON objects. Everything else
 * (comments, `event:`/`id:` fields, blank keep-alives, malformed JSON) is
 * skipped.
 */
export async function* dataPayloads(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<Record<string, unknown>> {
  for await (const line of textLines(chunks)) {
    if (!line.startsWith("data:")) continue;
    const data = line.slice(5).trim();
    if (!data) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      continue;
    }
    if (isRecord(parsed)) yield parsed;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toTaskEvent(raw: Record<string, unknown>): TaskEvent {
  switch (raw.type) {
    case "done":
      return { type: "done", raw };
    case "error":
      return {
        type: "error",
        message:
          typeof raw.message === "string" && raw.message
            ? raw.message
            : "unknown error",
        raw,
      };
    case "progress":
      return {
        type: "progress",
        progress: typeof raw.progress === "number" ? raw.progress : undefined,
        raw,
      };
    default:
      return { type: "other", raw };
  }
}

export async function* taskEvents(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<TaskEvent> {
  for await (const payload of dataPayloads(chunks)) {
    yield toTaskEvent(payload);
  }
}
