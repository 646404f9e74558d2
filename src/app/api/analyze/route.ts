import { z } from 'zod';
import { analyzeWebsite } from '@/lib/analysis-service';
import { createStream, STREAM_HEADERS } from '@/lib/http/stream';
import { BLOCKED_TARGET_MESSAGE } from '@/lib/crawler';
import { isBlockedTarget, normalizeUrl } from '@/lib/crawler/target-guard';

const RequestSchema = z.object({
  url: z.string().trim().min(1, 'Please enter a valid URL'),
  device_type: z.enum(['desktop', 'tablet', 'mobile']).default('desktop'),
});

function errorResponse(message: string, status: number) {
  return new Response(
    JSON.stringify({ type: 'error', message }) + '\n',
    { status, headers: STREAM_HEADERS }
  );
}

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return errorResponse('Invalid request body', 400);
  }

  let parsed: z.infer<typeof RequestSchema>;
  try {
    parsed = RequestSchema.parse(body);
  } catch (error) {
    const msg = error instanceof z.ZodError
      ? error.issues.map(i => i.message).join(', ')
      : 'Invalid input';
    return errorResponse(msg, 400);
  }

  let normalizedUrl: string;
  try {
    normalizedUrl = normalizeUrl(parsed.url);
  } catch (error) {
    return errorResponse(error instanceof Error ? error.message : 'Please enter a valid URL', 400);
  }

  if (await isBlockedTarget(new URL(normalizedUrl))) {
    return errorResponse(BLOCKED_TARGET_MESSAGE, 400);
  }

  const { stream, send, close } = createStream();

  void (async () => {
    try {
      const result = await analyzeWebsite(normalizedUrl, parsed.device_type, {
        onPhase: (phase, detail) => send({ type: 'phase', phase, detail }),
      });
      send({ type: 'result', data: result });
    } catch (error) {
      console.error('POST /api/analyze error:', error);
      send({ type: 'error', message: error instanceof Error ? error.message : 'Analysis failed' });
    } finally {
      close();
    }
  })();

  return new Response(stream, { headers: STREAM_HEADERS });
}
