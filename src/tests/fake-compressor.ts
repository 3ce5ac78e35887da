// In-process stand-in for the remote compression service.
import http from "node:http";

export type FakeScript = {
  // objects written as `data: {json}` lines on the progress stream
  events: Array<Record<string, unknown>>;
  artifact?: Buffer;
  // keep the progress stream open after the scripted events
  holdStream?: boolean;
  // send this many artifact bytes, then stall without ending the response
  stallDownloadAfter?: number;
};

export type RecordedRequest = {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
};

export type RecordedUpload = {
  filename: string;
  contentType: string;
  content: Buffer;
  targetSizeMb: string | null;
};

export type FakeCompressor = {
  baseUrl: string;
  requests: RecordedRequest[];
  uploads: RecordedUpload[];
  compressBodies: unknown[];
  // download responses the server has not yet seen closed
  openDownloads: () => number;
  close: () => Promise<void>;
};

export type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

export const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void,
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address == null || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
};

export function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    req.on("data", (d: Buffer) => parts.push(d));
    req.on("end", () => resolve(Buffer.concat(parts)));
    req.on("error", reject);
  });
}

/** Just enough multipart parsing for a single file part. */
export function parseSingleFilePart(
  body: Buffer,
  contentType: string,
): { filename: string; contentType: string; content: Buffer } {
  const m = contentType.match(/boundary=(.+)$/);
  if (!m) throw new Error(`no boundary in ${contentType}`);
  const boundary = m[1];
  const headEnd = body.indexOf("\r\n\r\n");
  const head = body.subarray(0, headEnd).toString("utf8");
  const end = body.lastIndexOf(`\r\n--${boundary}--`);
  const filename = head.match(/filename="([^"]*)"/)?.[1] ?? "";
  const partType = head.match(/Content-Type: (.+)/)?.[1]?.trim() ?? "";
  return {
    filename,
    contentType: partType,
    content: body.subarray(headEnd + 4, end),
  };
}

/**
 * Serves `/api/upload`, `/api/compress`, `/api/stream/:task` and
 * `/api/jobs/:task/download` the way the real service does. `script` decides
 * per uploaded file name what the progress stream and download look like.
 */
export async function startFakeCompressor(
  script: (filename: string) => FakeScript,
): Promise<FakeCompressor> {
  const requests: RecordedRequest[] = [];
  const uploads: RecordedUpload[] = [];
  const compressBodies: unknown[] = [];
  const taskScripts = new Map<string, FakeScript>();
  const serverNames = new Map<string, string>();
  let nextJob = 1;
  let nextTask = 1;
  let openDownloads = 0;

  const json = (res: http.ServerResponse, status: number, body: unknown) => {
    res.writeHead(status, { "content-type": "application/json" });
    res.end(JSON.stringify(body));
  };

  const server = await startServer((req, res) => {
    readBody(req).then(
      (body) => {
        const url = new URL(req.url ?? "/", "http://fake");
        requests.push({
          method: req.method ?? "",
          url: `${url.pathname}${url.search}`,
          headers: req.headers,
          body,
        });

        if (req.method === "POST" && url.pathname === "/api/upload") {
          const part = parseSingleFilePart(
            body,
            req.headers["content-type"] ?? "",
          );
          uploads.push({
            ...part,
            targetSizeMb: url.searchParams.get("target_size_mb"),
          });
          const serverName = `up-${nextJob}-${part.filename}`;
          serverNames.set(serverName, part.filename);
          json(res, 200, { filename: serverName, job_id: nextJob++ });
          return;
        }

        if (req.method === "POST" && url.pathname === "/api/compress") {
          const payload: unknown = JSON.parse(body.toString("utf8"));
          compressBodies.push(payload);
          const serverName =
            typeof payload === "object" && payload !== null
              ? Reflect.get(payload, "filename")
              : undefined;
          const original =
            typeof serverName === "string" ? serverNames.get(serverName) : "";
          const taskId = `task-${nextTask++}`;
          taskScripts.set(taskId, script(original ?? ""));
          json(res, 200, { task_id: taskId });
          return;
        }

        const stream = url.pathname.match(/^\/api\/stream\/([^/]+)$/);
        if (req.method === "GET" && stream) {
          const s = taskScripts.get(stream[1]);
          if (!s) return json(res, 404, { detail: "unknown task" });
          res.writeHead(200, { "content-type": "text/event-stream" });
          for (const event of s.events) {
            res.write(`data: ${JSON.stringify(event)}\n\n`);
          }
          if (!s.holdStream) res.end();
          return;
        }

        const download = url.pathname.match(
          /^\/api\/jobs\/([^/]+)\/download$/,
        );
        if (req.method === "GET" && download) {
          const s = taskScripts.get(download[1]);
          if (!s?.artifact) return json(res, 404, { detail: "no artifact" });
          openDownloads++;
          res.on("close", () => {
            openDownloads--;
          });
          res.writeHead(200, {
            "content-type": "application/octet-stream",
          });
          if (s.stallDownloadAfter != null) {
            res.write(s.artifact.subarray(0, s.stallDownloadAfter));
            return;
          }
          res.end(s.artifact);
          return;
        }

        json(res, 404, { detail: "not found" });
      },
      (err: unknown) => {
        res.destroy(err instanceof Error ? err : undefined);
      },
    );
  });

  return {
    baseUrl: `${server.baseUrl}/api`,
    requests,
    uploads,
    compressBodies,
    openDownloads: () => openDownloads,
    close: server.close,
  };
}
