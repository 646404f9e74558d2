import { beforeEach, describe, expect, it, vi } from 'vitest';

const lookupMock = vi.hoisted(() => vi.fn());

vi.mock('node:dns/promises', () => ({
  lookup: lookupMock,
}));

import { isBlockedTarget, isPrivateIpAddress, normalizeUrl, parseIpv6 } from './target-guard';

describe('normalizeUrl', () => {
  it('adds https when the scheme is missing', () => {
    expect(normalizeUrl('  shop.test/pricing ')).toBe('https://shop.test/pricing');
  });

  it('keeps an explicit http scheme', () => {
    expect(normalizeUrl('http://shop.test')).toBe('http://shop.test/');
  });

  it('rejects other schemes', () => {
    expect(() => normalizeUrl('ftp://shop.test/file')).toThrow('Only HTTP(S) URLs are supported');
  });

  it('rejects text that is not a URL', () => {
    expect(() => normalizeUrl('http://')).toThrow('Please enter a valid URL');
  });
});

describe('parseIpv6', () => {
  it('expands compressed groups', () => {
    expect(parseIpv6('fd00::1')).toEqual([0xfd00, 0, 0, 0, 0, 0, 0, 1]);
    expect(parseIpv6('::')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('folds a trailing dotted quad into two groups', () => {
    expect(parseIpv6('::ffff:10.1.2.3')).toEqual([0, 0, 0, 0, 0, 0xffff, 0x0a01, 0x0203]);
  });

  it('returns null for malformed input', () => {
    expect(parseIpv6('1::2::3')).toBeNull();
    expect(parseIpv6('1:2:3')).toBeNull();
    expect(parseIpv6('::ffff:300.1.1.1')).toBeNull();
  });
});

describe('isPrivateIpAddress', () => {
  it('recognises private and loopback ranges', () => {
    for (const address of [
      '10.0.0.8', '127.0.0.1', '172.20.1.1', '192.168.1.10', '169.254.169.254', '100.100.0.1',
      '::1', '::', 'fd00::1', 'fe80::1', '::ffff:10.1.2.3',
    ]) {
      expect(isPrivateIpAddress(address)).toBe(true);
    }
  });

  it('unwraps IPv4 carried in hex-form IPv6 addresses', () => {
    expect(isPrivateIpAddress('::ffff:7f00:1')).toBe(true);
    expect(isPrivateIpAddress('::ffff:a9fe:a9fe')).toBe(true);
    expect(isPrivateIpAddress('64:ff9b::a00:1')).toBe(true);
    expect(isPrivateIpAddress('::ffff:5db8:d822')).toBe(false);
  });

  it('lets public addresses through', () => {
    for (const address of ['93.184.216.34', '172.32.0.1', '100.128.0.1', '2606:4700::1111', 'shop.test']) {
      expect(isPrivateIpAddress(address)).toBe(false);
    }
  });
});

describe('isBlockedTarget', () => {
  beforeEach(() => {
    lookupMock.mockReset();
  });

  it('blocks internal hostnames without resolving them', async () => {
    expect(await isBlockedTarget(new URL('http://localhost:3000/'))).toBe(true);
    expect(await isBlockedTarget(new URL('http://printer.local/'))).toBe(true);
    expect(lookupMock).not.toHaveBeenCalled();
  });

  it('blocks literal private addresses', async () => {
    expect(await isBlockedTarget(new URL('http://192.168.0.1/'))).toBe(true);
    expect(await isBlockedTarget(new URL('http://[::1]/'))).toBe(true);
  });

  it('blocks IPv4-mapped loopback and metadata literals', async () => {
    expect(await isBlockedTarget(new URL(normalizeUrl('http://[::ffff:127.0.0.1]/admin')))).toBe(true);
    expect(await isBlockedTarget(new URL(normalizeUrl('http://[::ffff:169.254.169.254]/')))).toBe(true);
    expect(lookupMock).not.toHaveBeenCalled();
  });

  it('blocks schemes other than http(s)', async () => {
    expect(await isBlockedTarget(new URL('file:///etc/hosts'))).toBe(true);
  });

  it('blocks hostnames that resolve to a private address', async () => {
    lookupMock.mockResolvedValue([{ address: '10.0.0.5', family: 4 }]);
    expect(await isBlockedTarget(new URL('https://intranet.test/'))).toBe(true);
  });

  it('allows hostnames that resolve publicly', async () => {
    lookupMock.mockResolvedValue([{ address: '93.184.216.34', family: 4 }]);
    expect(await isBlockedTarget(new URL('https://shop.test/'))).toBe(false);
  });

  it('allows hostnames that fail to resolve', async () => {
    lookupMock.mockRejectedValue(new Error('ENOTFOUND'));
    expect(await isBlockedTarget(new URL('https://nowhere.test/'))).toBe(false);
  });
});
