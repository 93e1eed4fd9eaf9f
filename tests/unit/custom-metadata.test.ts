import { decodeCustomMetadata, encodeCustomMetadata } from '../../src/payments/custom-metadata';
import { MalformedPurchaseMetadataError } from '../../src/errors/app-error';

describe('custom metadata', () => {
  it('should encode plain values as username|product', () => {
    expect(encodeCustomMetadata({ username: 'alice', productName: 'Mod' })).toBe('alice|Mod');
  });

  it('should percent-encode spaces and the separator', () => {
    expect(encodeCustomMetadata({ username: 'a|b', productName: 'Hardcore VIP Perma' })).toBe(
      'a%7Cb|Hardcore%20VIP%20Perma',
    );
  });

  it('should round-trip values that contain the separator', () => {
    const pairs = [
      { username: 'alice', productName: 'Mod+' },
      { username: 'bob|builder', productName: 'Hardcore VIP 1 Month' },
      { username: '100% legit', productName: 'Ultra|Server' },
    ];
    for (const pair of pairs) {
      expect(decodeCustomMetadata(encodeCustomMetadata(pair))).toEqual(pair);
    }
  });

  it('should decode unescaped records written before escaping', () => {
    expect(decodeCustomMetadata('carol|Hardcore VIP Perma')).toEqual({
      username: 'carol',
      productName: 'Hardcore VIP Perma',
    });
  });

  it('should reject metadata without a separator', () => {
    expect(() => decodeCustomMetadata('alice')).toThrow(MalformedPurchaseMetadataError);
  });

  it('should reject metadata with more than one separator', () => {
    expect(() => decodeCustomMetadata('a|b|c')).toThrow('Expected exactly one "|"');
  });

  it('should reject missing metadata', () => {
    expect(() => decodeCustomMetadata(undefined)).toThrow('no purchase metadata');
    expect(() => decodeCustomMetadata('')).toThrow('no purchase metadata');
  });

  it('should reject empty fields', () => {
    expect(() => decodeCustomMetadata('|Mod')).toThrow('empty field');
  });

  it('should reject broken percent-encoding', () => {
    expect(() => decodeCustomMetadata('alice%E0|Mod')).toThrow('not valid percent-encoding');
  });
});
