/**
 * Purchase metadata carried through the provider's `custom` field.
 *
 * Format: `<username>|<product>` with each field percent-encoded, so a `|`
 * inside a field is written as `%7C` and the separator stays unique.
 * Plain values encode to themselves (`alice|Mod`).
 */

import { PurchaseMetadata } from './types';
import { MalformedPurchaseMetadataError } from '../errors/app-error';

const SEPARATOR = '|';

/** PayPal rejects `custom` values longer than this */
export const MAX_CUSTOM_LENGTH = 256;

export function encodeCustomMetadata(metadata: PurchaseMetadata): string {
  return `${encodeURIComponent(metadata.username)}${SEPARATOR}${encodeURIComponent(metadata.productName)}`;
}

export function decodeCustomMetadata(custom: string | undefined): PurchaseMetadata {
  if (custom === undefined || custom === '') {
    throw new MalformedPurchaseMetadataError('Payment record carries no purchase metadata', {
      details: { custom },
    });
  }

  const parts = custom.split(SEPARATOR);
  if (parts.length !== 2) {
    throw new MalformedPurchaseMetadataError(`Expected exactly one "${SEPARATOR}" in purchase metadata`, {
      details: { custom },
    });
  }

  const [rawUsername, rawProductName] = parts;
  try {
    const username = decodeURIComponent(rawUsername);
    const productName = decodeURIComponent(rawProductName);
    if (!username || !productName) {
      throw new MalformedPurchaseMetadataError('Purchase metadata has an empty field', { details: { custom } });
    }
    return { username, productName };
  } catch (err) {
    if (err instanceof MalformedPurchaseMetadataError) throw err;
    throw new MalformedPurchaseMetadataError('Purchase metadata is not valid percent-encoding', {
      details: { custom },
      cause: err,
    });
  }
}
