// src/multipart.ts
import { randomBytes } from "node:crypto";

export type MultipartFile = {
  field: string;
  filename: string;
  contentType: string;
  // called once per attempt; must yield the file bytes from the start
  content: () => AsyncIterable<Uint8Array>;
};

// RFC 7578 leaves escaping to the sender; follow what browsers do
function quoteFilename(name: string): string {
  return name
    .replace(/\r/g, "%0D")
    .replace(/\n/g, "%0A")
    .replace(/"/g, "%22");
}

export function makeBoundary(): string {
  return `----hotfolder${randomBytes(12).toString("hex")}`;
}

/**
 * A streamed multipart/form-data body with a single file part, so large
 * media files are never buffered in memory. `onChunk` fires for every chunk
 * handed to the network.
 */
export function multipartFileBody(
  file: MultipartFile,
  opts: { boundary?: string; onChunk?: () => void } = {},
): { body: ReadableStream<Uint8Array>; contentType: string } {
  const boundary = opts.boundary ?? makeBoundary();
  const head = Buffer.from(
    `--${boundary}\r\n` +
      `Content-Disposition: form-data; name="${file.field}"; filename="${quoteFilename(file.filename)}"\r\n` +
      `Content-Type: ${file.contentType}\r\n\r\n`,
    "utf8",
  );
  const tail = Buffer.from(`\r\n--${boundary}--\r\n`, "utf8");

  async function* parts(): AsyncGenerator<Uint8Array> {
    yield head;
    for await (const chunk of file.content()) {
      yield chunk;
    }
    yield tail;
  }

  const iterator = parts();
  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      const step = await iterator.next();
      if (step.done) {
        controller.close();
        return;
      }
      opts.onChunk?.();
      controller.enqueue(step.value);
    },
    async cancel() {
      await iterator.return(undefined);
    },
  });

  return {
    body,
    contentType: `multipart/form-data; boundary=${boundary}`,
  };
}
