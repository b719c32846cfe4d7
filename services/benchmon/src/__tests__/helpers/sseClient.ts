import http from "http";
import { URL } from "url";

export type SSEEvent = { event: string; data: unknown; id?: string };

type OnEventCb = (ev: SSEEvent) => void;

/**
 * Minimal server-sent events reader for tests. Collects every event and lets
 * callers wait for one matching a predicate.
 */
export function openSSE(urlStr: string, options?: { headers?: Record<string, string> }) {
  const url = new URL(urlStr);
  const events: SSEEvent[] = [];
  const onEventCbs: OnEventCb[] = [];
  let buffer = "";
  let resRef: http.IncomingMessage | null = null;
  let close = () => {};

  const opened = new Promise<number>((resolve, reject) => {
    const req = http.request(
      {
        method: "GET",
        hostname: url.hostname,
        port: url.port,
        path: `${url.pathname}${url.search}`,
        headers: { Accept: "text/event-stream", ...options?.headers }
      },
      (res) => {
        resRef = res;
        resolve(res.statusCode ?? 0);
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          buffer += chunk;
          // Process full SSE records separated by blank line
          let idx: number;
          while ((idx = buffer.indexOf("\n\n")) !== -1) {
            const raw = buffer.slice(0, idx);
            buffer = buffer.slice(idx + 2);
            processBlock(raw);
          }
        });
      }
    );
    req.on("error", reject);
    req.end();
    close = () => {
      resRef?.destroy();
      req.destroy();
    };
  });

  function processBlock(block: string) {
    let id: string | undefined;
    let event = "message";
    const dataLines: string[] = [];

    for (const line of block.split("\n").map((l) => l.replace(/\r$/, ""))) {
      // comments are heartbeats
      if (line.length === 0 || line.startsWith(":")) continue;
      const [field, ...rest] = line.split(":");
      const value = rest.join(":").trimStart();
      if (field === "id") id = value;
      else if (field === "event") event = value || "message";
      else if (field === "data") dataLines.push(value);
    }
    if (dataLines.length === 0) return;

    const dataStr = dataLines.join("\n");
    let data: unknown = dataStr;
    try {
      data = JSON.parse(dataStr);
    } catch {
      // keep the raw string
    }

    const ev: SSEEvent = id ? { event, data, id } : { event, data };
    events.push(ev);
    for (const cb of onEventCbs) cb(ev);
  }

  const waitFor = (pred: (e: SSEEvent) => boolean, timeout = 3000) =>
    new Promise<SSEEvent>((resolve, reject) => {
      const seen = events.find(pred);
      if (seen) return resolve(seen);
      const to = setTimeout(() => reject(new Error("timeout waiting for event")), timeout);
      onEventCbs.push((ev) => {
        if (pred(ev)) {
          clearTimeout(to);
          resolve(ev);
        }
      });
    });

  return {
    opened,
    events,
    waitFor,
    close: () => close()
  };
}
