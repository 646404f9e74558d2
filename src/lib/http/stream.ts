export const STREAM_HEADERS = {
  'Content-Type': 'application/x-ndjson',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
};

export type StreamEvent =
  | { type: 'phase'; phase: string; detail: string }
  | { type: 'result'; data: unknown }
  | { type: 'error'; message: string };

/** One JSON event per line; writes after close are dropped. */
export function createStream() {
  const encoder = new TextEncoder();
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  let closed = false;

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
    cancel() {
      closed = true;
    },
  });

  const send = (event: StreamEvent) => {
    if (closed || !controller) return;
    controller.enqueue(encoder.encode(JSON.stringify(event) + '\n'));
  };

  const close = () => {
    if (closed || !controller) return;
    closed = true;
    controller.close();
  };

  return { stream, send, close };
}
