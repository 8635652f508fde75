import { describe, it, expect, vi, afterEach } from 'vitest';
import { createRng } from '../services/random';
import type { Logger } from '../services/logService';
import { RemoteCompanyProvider, StaticCompanyProvider, domainFromName } from './companyProvider';

const SOURCE_URL = 'https://companies.example.test/list.json';

const fakeLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const remoteProvider = (logger: Logger) =>
  new RemoteCompanyProvider({
    url: SOURCE_URL,
    rng: createRng(1),
    fallback: new StaticCompanyProvider(createRng(1), [{ name: 'Fallback Co', domain: 'fallback.test' }]),
    logger,
  });

describe('domainFromName', () => {
  it('keeps lowercase alphanumerics', () => {
    expect(domainFromName('Acme & Sons, Inc.')).toBe('acmesonsinc.com');
  });
});

describe('StaticCompanyProvider', () => {
  it('picks from its list', async () => {
    const provider = new StaticCompanyProvider(createRng(1), [{ name: 'Solo Corp', domain: 'solo.test' }]);
    await expect(provider.company()).resolves.toEqual({ name: 'Solo Corp', domain: 'solo.test' });
  });

  it('ships a usable default list', async () => {
    const company = await new StaticCompanyProvider(createRng(2)).company();
    expect(company.name.length).toBeGreaterThan(0);
    expect(company.domain).toContain('.');
  });
});

describe('RemoteCompanyProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('derives missing domains from remote entries', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify([{ name: 'Remote Works' }])));
    vi.stubGlobal('fetch', fetchMock);
    const logger = fakeLogger();

    await expect(remoteProvider(logger).company()).resolves.toEqual({ name: 'Remote Works', domain: 'remoteworks.com' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(SOURCE_URL);
    expect(logger.info).toHaveBeenCalledWith(`Loaded 1 companies from ${SOURCE_URL}`);
  });

  it('falls back on an error status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('unavailable', { status: 503 })));
    const logger = fakeLogger();

    await expect(remoteProvider(logger).company()).resolves.toEqual({ name: 'Fallback Co', domain: 'fallback.test' });
    expect(logger.warn).toHaveBeenCalledWith('Company source failed (HTTP 503); using fallback list.');
  });

  it('falls back on a payload of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(JSON.stringify({ companies: [] }))));
    const logger = fakeLogger();

    await expect(remoteProvider(logger).company()).resolves.toEqual({ name: 'Fallback Co', domain: 'fallback.test' });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back when the request rejects', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND')));
    const logger = fakeLogger();

    await expect(remoteProvider(logger).company()).resolves.toEqual({ name: 'Fallback Co', domain: 'fallback.test' });
    expect(logger.warn).toHaveBeenCalledWith('Company source failed (getaddrinfo ENOTFOUND); using fallback list.');
  });
});
