import { beforeEach, describe, expect, it, vi } from 'vitest';

import { collectUrls, parseActorInputJson, runActor } from '../../src/actor/actorRunner';
import { buildService, FakeGenerator, FakeProducts, makeProduct } from '../helpers/fakes';

describe('actor input', () => {
  it('merges amazonUrls and amazonUrl, dropping blanks', () => {
    expect(
      collectUrls({ amazonUrls: [' https://www.amazon.com/dp/B0TEST0001 ', ''], amazonUrl: 'https://www.amazon.de/dp/B0TEST0002' }),
    ).toEqual(['https://www.amazon.com/dp/B0TEST0001', 'https://www.amazon.de/dp/B0TEST0002']);
  });

  it('parses JSON input and rejects unknown modes', () => {
    expect(parseActorInputJson('{"amazonUrl":"https://www.amazon.com/dp/B0TEST0001","mode":"optimize"}')).toEqual({
      amazonUrl: 'https://www.amazon.com/dp/B0TEST0001',
      mode: 'optimize',
    });
    expect(() => parseActorInputJson('{"mode":"translate"}')).toThrow('Invalid actor input');
    expect(() => parseActorInputJson('{not json')).toThrow('Failed to parse APIFY_INPUT env var as JSON');
  });
});

describe('runActor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  const service = buildService(new FakeProducts({ B0TEST0001: makeProduct() }), new FakeGenerator());

  it('requires at least one URL', async () => {
    await expect(runActor(service, {})).rejects.toThrow('amazonUrls (or amazonUrl) is required');
  });

  it('analyzes every URL by default', async () => {
    const items = await runActor(service, {
      amazonUrls: ['https://www.amazon.com/dp/B0TEST0001', 'https://www.amazon.com/'],
    });

    expect(items).toHaveLength(2);
    expect(items[0]).toMatchObject({ asin: 'B0TEST0001', report: 'generated report' });
    expect(items[1]).toMatchObject({ asin: 'ERROR', error: 'invalid_url' });
  });

  it('pushes one item per URL in optimize mode, failures included', async () => {
    const items = await runActor(service, {
      mode: 'optimize',
      amazonUrls: ['https://www.amazon.com/dp/B0TEST0001', 'https://www.amazon.com/dp/B0MISSING1'],
    });

    expect(items).toEqual([
      {
        status: 'ok',
        url: 'https://www.amazon.com/dp/B0TEST0001',
        optimized_listing_report: 'generated report',
        asin: 'B0TEST0001',
        country: 'US',
      },
      {
        status: 'error',
        url: 'https://www.amazon.com/dp/B0MISSING1',
        error: 'upstream_not_found',
        message: 'Product B0MISSING1 was not found in the Amazon data API.',
      },
    ]);
  });
});
