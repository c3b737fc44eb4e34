/**
 * HTTP front door for the orchestrator.
 * POST /chat   -> { session_id, content, stream? }; JSON reply, or SSE when stream is true.
 * GET /health  -> 200 while the process is up.
 */

import * as http from "http";
import { z } from "zod";
import {
  InvalidPrompt,
  ProviderRejected,
  ProviderTimeout,
  ProviderUnavailable,
  errorMessage,
  toStructuredError,
} from "../errors";
import { logger } from "../logging";
import { getExchangeTotals } from "../metrics";
import type { Orchestrator } from "../pipeline/orchestrator";
import type { ReplyEvent } from "../pipeline/types";

const MAX_BODY_BYTES = 1_000_000;

const ChatRequestSchema = z.object({
  session_id: z.string().min(1),
  content: z.string().min(1),
  stream: z.boolean().optional().default(false),
  deadline_ms: z.number().int().positive().optional(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

class BodyTooLarge extends Error {}

/** HTTP status for a failed exchange. */
export function statusForError(err: unknown): number {
  if (err instanceof InvalidPrompt) return 400;
  if (err instanceof ProviderRejected) return 502;
  if (err instanceof ProviderUnavailable) return 503;
  if (err instanceof ProviderTimeout) return 504;
  return 500;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLarge(`body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Wire form of a stream event; errors become their structured record. */
function toWireEvent(event: ReplyEvent): Record<string, unknown> {
  if (event.type === "truncated") {
    return { type: "truncated", session_id: event.sessionId, partial_text: event.partialText, error: toStructuredError(event.error) };
  }
  if (event.type === "done") {
    return { type: "done", session_id: event.sessionId, reply: event.text, model: event.model, usage: event.usage };
  }
  return event;
}

async function handleChat(orchestrator: Orchestrator, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  let raw: string;
  try {
    raw = await readBody(req);
  } catch (err) {
    sendJson(res, err instanceof BodyTooLarge ? 413 : 400, { error: { code: "INVALID_PROMPT", message: errorMessage(err) } });
    return;
  }
  const parsed = ChatRequestSchema.safeParse(parseJson(raw));
  if (!parsed.success || !parsed.data.session_id.trim() || !parsed.data.content.trim()) {
    sendJson(res, 400, { error: { code: "INVALID_PROMPT", message: "expected { session_id, content, stream? }" } });
    return;
  }
  const body = parsed.data;
  const options = { deadlineMs: body.deadline_ms };

  if (!body.stream) {
    try {
      const result = await orchestrator.reply(body.session_id, body.content, options);
      sendJson(res, 200, { session_id: result.sessionId, reply: result.text, model: result.model, usage: result.usage });
    } catch (err) {
      sendJson(res, statusForError(err), { error: toStructuredError(err) });
    }
    return;
  }

  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });
  const stream = orchestrator.replyStreaming(body.session_id, body.content, options);
  // Client went away: stop pulling from the provider.
  const onClose = (): void => {
    if (!res.writableEnded) {
      stream.return(undefined).catch((err: unknown) =>
        logger.debug({ event: "CHAT_STREAM_CLOSE_FAILED", err: errorMessage(err) }, "Stream close failed")
      );
    }
  };
  res.on("close", onClose);
  try {
    for await (const event of stream) {
      res.write(`data: ${JSON.stringify(toWireEvent(event))}\n\n`);
    }
  } catch (err) {
    res.write(`data: ${JSON.stringify({ type: "error", error: toStructuredError(err) })}\n\n`);
  } finally {
    res.off("close", onClose);
    res.end();
  }
}

export interface ChatServerOptions {
  port?: number;
}

/** Create (not start) the server. */
export function createChatServer(orchestrator: Orchestrator): http.Server {
  return http.createServer((req, res) => {
    const url = (req.url ?? "").split("?")[0];
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      sendJson(res, 200, { ok: true, ...getExchangeTotals() });
      return;
    }
    if (req.method === "POST" && url === "/chat") {
      handleChat(orchestrator, req, res).catch((err: unknown) => {
        logger.error({ event: "CHAT_HANDLER_FAILED", err: errorMessage(err) }, "Chat handler failed");
        if (!res.headersSent) sendJson(res, 500, { error: toStructuredError(err) });
        else res.end();
      });
      return;
    }
    res.writeHead(404);
    res.end();
  });
}

export function startChatServer(orchestrator: Orchestrator, options: ChatServerOptions = {}): http.Server {
  const port = options.port ?? 8080;
  const server = createChatServer(orchestrator);
  server.listen(port, () => {
    logger.info({ event: "CHAT_SERVER_STARTED", port }, "Chat server listening");
  });
  return server;
}
