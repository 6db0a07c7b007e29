import type http from "node:http";

export type RouteRequest = {
  method: string;
  url: URL;
  headers: http.IncomingHttpHeaders;
  body?: unknown;
};

export type JsonResponse = {
  status: number;
  body: unknown;
};

export const json = (status: number, body: unknown): JsonResponse => ({ status, body });

export const sendJson = (res: http.ServerResponse, response: JsonResponse) => {
  res.writeHead(response.status, { "content-type": "application/json" });
  res.end(JSON.stringify(response.body));
};

export const bearerToken = (headers: http.IncomingHttpHeaders, fallbackHeader: string) => {
  const header = headers.authorization;
  if (header?.startsWith("Bearer ")) {
    return header.slice(7);
  }
  const fallback = headers[fallbackHeader];
  return typeof fallback === "string" ? fallback : undefined;
};

export const toRouteRequest = (req: http.IncomingMessage): RouteRequest => ({
  method: req.method ?? "GET",
  url: new URL(req.url ?? "/", "http://localhost"),
  headers: req.headers
});

export type JsonBodyResult =
  | { ok: true; body: unknown }
  | { ok: false; response: JsonResponse };

export const readJsonBody = async (
  req: http.IncomingMessage,
  maxBodyBytes: number
): Promise<JsonBodyResult> => {
  const chunks: Buffer[] = [];
  let size = 0;
  // Oversized bodies are drained, not abandoned: leaving the loop early destroys the socket
  // before the 413 can be written.
  for await (const chunk of req) {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += data.length;
    if (size <= maxBodyBytes) {
      chunks.push(data);
    }
  }
  if (size > maxBodyBytes) {
    return { ok: false, response: json(413, { error: "Payload too large." }) };
  }
  if (chunks.length === 0) {
    return { ok: false, response: json(400, { error: "Request body is empty." }) };
  }
  const raw = Buffer.concat(chunks).toString("utf-8");
  try {
    const body: unknown = JSON.parse(raw);
    return { ok: true, body };
  } catch {
    return { ok: false, response: json(400, { error: "Invalid JSON body." }) };
  }
};

export const listen = async (server: http.Server, port: number, host: string) => {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
};

export const closeServer = async (server: http.Server) => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
};
