import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { analyzeMock, lookupMock } = vi.hoisted(() => ({
  analyzeMock: vi.fn(),
  lookupMock: vi.fn(),
}));

vi.mock('@/lib/analysis-service', () => ({
  analyzeWebsite: analyzeMock,
}));

vi.mock('node:dns/promises', () => ({
  lookup: lookupMock,
}));

import { POST } from './route';

function post(body: string) {
  return new Request('http://localhost:3000/api/analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

async function readNDJSON(response: Response): Promise<unknown[]> {
  const text = await response.text();
  return text.trim().split('\n').filter(l => l.trim()).map(l => JSON.parse(l));
}

describe('POST /api/analyze', () => {
  beforeEach(() => {
    analyzeMock.mockReset();
    lookupMock.mockReset();
    lookupMock.mockResolvedValue([{ address: '93.184.216.34', family: 4 }]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('streams phases and then the result', async () => {
    analyzeMock.mockImplementation(async (_url: string, _device: string, options: { onPhase: (phase: string, detail: string) => void }) => {
      options.onPhase('capturing', 'Fetching https://shop.test/ as desktop');
      options.onPhase('scoring', 'Applying usability rules');
      return { total_score: 81 };
    });

    const response = await POST(post(JSON.stringify({ url: 'shop.test' })));
    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('application/x-ndjson');

    expect(await readNDJSON(response)).toEqual([
      { type: 'phase', phase: 'capturing', detail: 'Fetching https://shop.test/ as desktop' },
      { type: 'phase', phase: 'scoring', detail: 'Applying usability rules' },
      { type: 'result', data: { total_score: 81 } },
    ]);
    expect(analyzeMock).toHaveBeenCalledWith('https://shop.test/', 'desktop', expect.any(Object));
  });

  it('passes the requested device type through', async () => {
    analyzeMock.mockResolvedValue({ total_score: 50 });
    const response = await POST(post(JSON.stringify({ url: 'https://shop.test/cart', device_type: 'tablet' })));
    await readNDJSON(response);
    expect(analyzeMock).toHaveBeenCalledWith('https://shop.test/cart', 'tablet', expect.any(Object));
  });

  it('rejects a body that is not JSON', async () => {
    const response = await POST(post('{not json'));
    expect(response.status).toBe(400);
    expect(await readNDJSON(response)).toEqual([{ type: 'error', message: 'Invalid request body' }]);
  });

  it('rejects a blank URL', async () => {
    const response = await POST(post(JSON.stringify({ url: '   ' })));
    expect(response.status).toBe(400);
    expect(await readNDJSON(response)).toEqual([{ type: 'error', message: 'Please enter a valid URL' }]);
  });

  it('rejects an unknown device type', async () => {
    const response = await POST(post(JSON.stringify({ url: 'shop.test', device_type: 'watch' })));
    expect(response.status).toBe(400);
    expect(analyzeMock).not.toHaveBeenCalled();
  });

  it('rejects non-http schemes', async () => {
    const response = await POST(post(JSON.stringify({ url: 'ftp://shop.test/' })));
    expect(response.status).toBe(400);
    expect(await readNDJSON(response)).toEqual([{ type: 'error', message: 'Only HTTP(S) URLs are supported' }]);
  });

  it('refuses private network targets', async () => {
    lookupMock.mockResolvedValue([{ address: '10.1.1.1', family: 4 }]);
    const response = await POST(post(JSON.stringify({ url: 'https://intranet.test/' })));
    expect(response.status).toBe(400);
    expect(await readNDJSON(response)).toEqual([
      { type: 'error', message: 'This URL points to a private/internal network target and cannot be analyzed.' },
    ]);
    expect(analyzeMock).not.toHaveBeenCalled();
  });

  it('refuses an IPv4-mapped IPv6 literal for the metadata address', async () => {
    const response = await POST(post(JSON.stringify({ url: 'http://[::ffff:169.254.169.254]/latest/meta-data' })));
    expect(response.status).toBe(400);
    expect(await readNDJSON(response)).toEqual([
      { type: 'error', message: 'This URL points to a private/internal network target and cannot be analyzed.' },
    ]);
    expect(analyzeMock).not.toHaveBeenCalled();
  });

  it('turns an analysis failure into an error event', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    analyzeMock.mockRejectedValue(new Error('Failed to fetch https://shop.test/: HTTP 500'));

    const response = await POST(post(JSON.stringify({ url: 'https://shop.test/' })));
    expect(response.status).toBe(200);
    expect(await readNDJSON(response)).toEqual([
      { type: 'error', message: 'Failed to fetch https://shop.test/: HTTP 500' },
    ]);
  });
});
