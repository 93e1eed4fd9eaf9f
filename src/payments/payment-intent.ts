import { Product } from '../catalog/types';
import { toDecimalString } from '../utils/format';
import { PaymentIntent, PaymentLink } from './types';

export const CURRENCY = 'USD';

export interface RedirectUrls {
  returnUrl: string;
  cancelUrl: string;
}

/** `Hardcore VIP Perma` → `hardcore_vip_perma` */
export function toSku(productName: string): string {
  return productName.toLowerCase().replace(/ /g, '_');
}

export function redirectUrlsFor(baseUrl: string): RedirectUrls {
  const base = baseUrl.replace(/\/+$/, '');
  return {
    returnUrl: `${base}/execute-payment`,
    cancelUrl: `${base}/cancel-payment`,
  };
}

/**
 * Single-item sale for one catalog product.
 */
export function buildPaymentIntent(product: Product, username: string, custom: string, urls: RedirectUrls): PaymentIntent {
  const price = toDecimalString(product.price);

  return {
    intent: 'sale',
    payer: { payment_method: 'paypal' },
    redirect_urls: {
      return_url: urls.returnUrl,
      cancel_url: urls.cancelUrl,
    },
    transactions: [
      {
        item_list: {
          items: [
            {
              name: product.name,
              sku: toSku(product.name),
              price,
              currency: CURRENCY,
              quantity: 1,
              description: product.description,
            },
          ],
        },
        amount: { total: price, currency: CURRENCY },
        description: `${product.name} purchase for ${username}`,
        custom,
      },
    ],
  };
}

export function findApprovalUrl(links: readonly PaymentLink[]): string | undefined {
  return links.find((link) => link.rel === 'approval_url')?.href;
}
