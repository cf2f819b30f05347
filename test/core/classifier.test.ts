import { describe, it, expect } from 'vitest';
import {
  DATALAYER_KEYWORDS,
  isAnalyticsNetworkLine,
  isDataLayerRelated,
  matchesConsoleApiArgument,
  stringifyArgument,
} from '../../src/core/classifier.js';

describe('isDataLayerRelated', () => {
  it.each(DATALAYER_KEYWORDS.map((k) => [k]))('should match keyword %s', (keyword) => {
    expect(isDataLayerRelated(`prefix ${keyword} suffix`)).toBe(true);
  });

  it('should match regardless of case', () => {
    expect(isDataLayerRelated('DataLayer Event Captured:')).toBe(true);
    expect(isDataLayerRelated('Loaded GOOGLE TAG MANAGER container')).toBe(true);
    expect(isDataLayerRelated('window.GTAG is ready')).toBe(true);
  });

  it('should match the compound event + track rule', () => {
    expect(isDataLayerRelated('user eventTracking fired')).toBe(true);
    expect(isDataLayerRelated('TRACK this EVENT')).toBe(true);
  });

  it('should not match event without track', () => {
    expect(isDataLayerRelated('event only')).toBe(false);
    expect(isDataLayerRelated('track only')).toBe(false);
  });

  it('should not match unrelated lines', () => {
    expect(isDataLayerRelated('Uncaught TypeError: x is undefined')).toBe(false);
    expect(isDataLayerRelated('[HMR] connected')).toBe(false);
  });

  it('should treat null, undefined and empty input as no match', () => {
    expect(isDataLayerRelated(null)).toBe(false);
    expect(isDataLayerRelated(undefined)).toBe(false);
    expect(isDataLayerRelated('')).toBe(false);
  });
});

describe('isAnalyticsNetworkLine', () => {
  it('should match analytics hosts and gtag', () => {
    expect(isAnalyticsNetworkLine('{"url":"https://www.googletagmanager.com/gtm.js?id=GTM-TEST"}')).toBe(true);
    expect(isAnalyticsNetworkLine('https://www.Google-Analytics.com/collect')).toBe(true);
    expect(isAnalyticsNetworkLine('/gtag/js?id=G-TEST')).toBe(true);
  });

  it('should not match other traffic or empty input', () => {
    expect(isAnalyticsNetworkLine('{"url":"https://example.com/app.js"}')).toBe(false);
    expect(isAnalyticsNetworkLine('datalayer')).toBe(false);
    expect(isAnalyticsNetworkLine(null)).toBe(false);
    expect(isAnalyticsNetworkLine('')).toBe(false);
  });
});

describe('matchesConsoleApiArgument', () => {
  it('should match strings case-insensitively', () => {
    expect(matchesConsoleApiArgument('dataLayer push')).toBe(true);
    expect(matchesConsoleApiArgument('DATALAYER')).toBe(true);
    expect(matchesConsoleApiArgument('gtag config')).toBe(true);
  });

  it('should match objects through their JSON form', () => {
    expect(matchesConsoleApiArgument({ source: 'dataLayer.push' })).toBe(true);
    expect(matchesConsoleApiArgument({ event: 'page_view' })).toBe(false);
  });

  it('should not match gtm alone', () => {
    expect(matchesConsoleApiArgument('gtm.js loaded')).toBe(false);
  });

  it('should never throw on awkward values', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(matchesConsoleApiArgument(null)).toBe(false);
    expect(matchesConsoleApiArgument(undefined)).toBe(false);
    expect(matchesConsoleApiArgument(cyclic)).toBe(false);
    expect(matchesConsoleApiArgument(Object.create(null))).toBe(false);
    expect(matchesConsoleApiArgument(10n)).toBe(false);
  });
});

describe('stringifyArgument', () => {
  it('should keep strings and JSON-encode other values', () => {
    expect(stringifyArgument('plain')).toBe('plain');
    expect(stringifyArgument(42)).toBe('42');
    expect(stringifyArgument({ a: 1 })).toBe('{"a":1}');
    expect(stringifyArgument(null)).toBe('');
  });

  it('should fall back for values JSON cannot encode', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(stringifyArgument(10n)).toBe('10');
    expect(stringifyArgument(cyclic)).toBe('[object Object]');
  });
});
