import { z } from 'zod';
import { AnalysisPhase, AnalysisResult, DeviceType } from '../types';

const PhaseSchema = z.enum(['capturing', 'extracting-html', 'extracting-image', 'scoring']);

const StreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('phase'), phase: PhaseSchema, detail: z.string().default('') }),
  z.object({ type: z.literal('result'), data: z.unknown() }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

function isAnalysisResult(value: unknown): value is AnalysisResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'analysis_id' in value &&
    typeof value.analysis_id === 'string' &&
    'total_score' in value &&
    typeof value.total_score === 'number' &&
    'category_details' in value &&
    typeof value.category_details === 'object'
  );
}

function handleLine(
  line: string,
  onPhase?: (phase: AnalysisPhase, detail: string) => void,
): AnalysisResult | null {
  if (!line.trim()) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = StreamEventSchema.safeParse(raw);
  if (!parsed.success) return null;

  const event = parsed.data;
  if (event.type === 'error') throw new Error(event.message);
  if (event.type === 'phase') {
    onPhase?.(event.phase, event.detail);
    return null;
  }
  return isAnalysisResult(event.data) ? event.data : null;
}

/**
 * Reads the NDJSON stream of POST /api/analyze. Lines that are not JSON or
 * not a known event are skipped; an error event rejects.
 */
export async function readAnalysisStream(
  response: Response,
  onPhase?: (phase: AnalysisPhase, detail: string) => void,
): Promise<AnalysisResult> {
  if (!response.body) throw new Error('No response body');

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let result: AnalysisResult | null = null;
  let buffer = '';

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() || '';
    for (const line of lines) {
      result = handleLine(line, onPhase) ?? result;
    }
  }
  result = handleLine(buffer + decoder.decode(), onPhase) ?? result;

  if (!result) throw new Error('Analysis failed: no result received');
  return result;
}

export async function requestAnalysis(
  url: string,
  deviceType: DeviceType,
  onPhase?: (phase: AnalysisPhase, detail: string) => void,
): Promise<AnalysisResult> {
  const response = await fetch('/api/analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ url: url.trim(), device_type: deviceType }),
  });
  return readAnalysisStream(response, onPhase);
}
