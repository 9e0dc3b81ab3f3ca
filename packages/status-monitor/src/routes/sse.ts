import type { FastifyReply } from "fastify";

const HEARTBEAT_MS = 30_000;

export interface EventStream {
  /** Aborts when the client disconnects or the stream is closed. */
  readonly signal: AbortSignal;
  send(data: unknown): void;
  close(): void;
}

/**
 * Take over the raw response and turn it into a Server-Sent Events stream.
 * Headers already set on the reply (CORS) are carried over.
 */
export function openEventStream(reply: FastifyReply): EventStream {
  reply.hijack();
  reply.raw.writeHead(200, {
    ...reply.getHeaders(),
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
    "X-Accel-Buffering": "no",
  });
  reply.raw.write(": connected\n\n");

  const controller = new AbortController();
  const heartbeat = setInterval(() => {
    reply.raw.write(": heartbeat\n\n");
  }, HEARTBEAT_MS);

  const stop = (): void => {
    clearInterval(heartbeat);
    controller.abort();
  };
  reply.raw.on("close", stop);

  return {
    signal: controller.signal,
    send(data: unknown): void {
      if (controller.signal.aborted) return;
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    },
    close(): void {
      stop();
      if (!reply.raw.writableEnded && !reply.raw.destroyed) reply.raw.end();
    },
  };
}
