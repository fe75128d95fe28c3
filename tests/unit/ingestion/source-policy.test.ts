import { describe, it, expect } from 'vitest';
import {
  allDetections,
  normalizePlatformName,
  platformAllowList,
} from '@/ingestion/source-policy.js';

describe('normalizePlatformName', () => {
  it('lowercases and strips spaces and underscores', () => {
    expect(normalizePlatformName('Net_Craft')).toBe('netcraft');
    expect(normalizePlatformName('Data Dog')).toBe('datadog');
    expect(normalizePlatformName('Cloud-flare')).toBe('cloud-flare');
  });
});

describe('allDetections', () => {
  it('accepts every segment and root-level files', () => {
    expect(allDetections.allows('Anything')).toBe(true);
    expect(allDetections.allows(undefined)).toBe(true);
  });
});

describe('platformAllowList', () => {
  const policy = platformAllowList(['Cloudflare', 'Netcraft', 'Datadog']);

  it('accepts listed platforms in any spelling', () => {
    expect(policy.allows('cloudflare')).toBe(true);
    expect(policy.allows('DATA_DOG')).toBe(true);
  });

  it('rejects other platforms and root-level files', () => {
    expect(policy.allows('Okta')).toBe(false);
    expect(policy.allows(undefined)).toBe(false);
  });

  it('names the normalized allow-list', () => {
    expect(policy.name).toBe('platforms(cloudflare,datadog,netcraft)');
  });
});
