import { describe, it, expect } from 'vitest';
import { remoteValue } from '../../src/browser/remote.js';

describe('remoteValue', () => {
  it('should return primitive values as sent', () => {
    expect(remoteValue({ type: 'string', value: 'DataLayer Event Captured:' })).toBe(
      'DataLayer Event Captured:',
    );
    expect(remoteValue({ type: 'number', value: 3 })).toBe(3);
  });

  it('should fall back to the unserializable form', () => {
    expect(remoteValue({ type: 'number', unserializableValue: 'NaN', description: 'NaN' })).toBe('NaN');
    expect(remoteValue({ type: 'function', description: 'function f() {}' })).toBe('function f() {}');
  });

  it('should rebuild a pushed record from its preview', () => {
    const arg = {
      type: 'object',
      description: 'Object',
      preview: {
        description: 'Object',
        overflow: false,
        properties: [
          {
            name: 'data',
            type: 'object',
            value: 'Object',
            valuePreview: {
              description: 'Object',
              overflow: false,
              properties: [
                { name: 'event', type: 'string', value: 'add_to_cart' },
                { name: 'value', type: 'number', value: '19.5' },
                { name: 'track', type: 'boolean', value: 'true' },
                { name: 'coupon', type: 'object', subtype: 'null', value: 'null' },
              ],
            },
          },
          { name: 'timestamp', type: 'number', value: '1700000000000' },
          { name: 'source', type: 'string', value: 'dataLayer.push' },
        ],
      },
    };

    expect(remoteValue(arg)).toEqual({
      data: { event: 'add_to_cart', value: 19.5, track: true, coupon: null },
      timestamp: 1_700_000_000_000,
      source: 'dataLayer.push',
    });
  });

  it('should rebuild arrays from their indexed properties', () => {
    const arg = {
      type: 'object',
      subtype: 'array',
      preview: {
        subtype: 'array',
        overflow: false,
        properties: [
          { name: '0', type: 'string', value: 'js' },
          { name: '1', type: 'number', value: '2' },
        ],
      },
    };

    expect(remoteValue(arg)).toEqual(['js', 2]);
  });

  it('should keep nested objects without a preview as their summary', () => {
    const arg = {
      type: 'object',
      preview: {
        overflow: false,
        properties: [{ name: 'items', type: 'object', subtype: 'array', value: 'Array(3)' }],
      },
    };

    expect(remoteValue(arg)).toEqual({ items: 'Array(3)' });
  });
});
