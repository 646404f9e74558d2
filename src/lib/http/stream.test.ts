import { describe, expect, it } from 'vitest';
import { createStream } from './stream';

async function readAll(stream: ReadableStream<Uint8Array>): Promise<string> {
  return new Response(stream).text();
}

describe('createStream', () => {
  it('writes one JSON event per line', async () => {
    const { stream, send, close } = createStream();
    send({ type: 'phase', phase: 'capturing', detail: 'Fetching' });
    send({ type: 'error', message: 'boom' });
    close();

    expect(await readAll(stream)).toBe(
      '{"type":"phase","phase":"capturing","detail":"Fetching"}\n{"type":"error","message":"boom"}\n',
    );
  });

  it('drops events sent after close and tolerates a second close', async () => {
    const { stream, send, close } = createStream();
    send({ type: 'result', data: { total_score: 80 } });
    close();
    send({ type: 'error', message: 'late' });
    close();

    expect(await readAll(stream)).toBe('{"type":"result","data":{"total_score":80}}\n');
  });
});
