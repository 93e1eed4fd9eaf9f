import { Product } from '../catalog/types';
import { escapeHtml, formatUsd } from '../utils/format';
import { MAX_CUSTOM_LENGTH } from '../payments/custom-metadata';

/** One UTF-16 unit percent-encodes to at most 9 characters (a 3-byte sequence) */
const MAX_ENCODED_CHARS_PER_UNIT = 9;

const BODY_STYLE = 'font-family: Arial, sans-serif; text-align: center; padding: 50px; background: #1a1a1a; color: white;';
const LINK_STYLE = 'color: #007bff; text-decoration: none;';

function page(title: string, shopName: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>${escapeHtml(title)} - ${escapeHtml(shopName)}</title>
</head>
<body style="${BODY_STYLE}">
${body}
  <a href="/" style="${LINK_STYLE}">&larr; Back to Shop</a>
</body>
</html>
`;
}

export interface PaymentSuccessView {
  username: string;
  productName: string;
  amount: number;
}

export function renderPaymentSuccessPage(shopName: string, view: PaymentSuccessView): string {
  return page(
    'Payment Successful',
    shopName,
    `  <h1 style="color: #28a745;">✅ Payment Successful!</h1>
  <p>Thank you <strong>${escapeHtml(view.username)}</strong>!</p>
  <p>Your purchase of <strong>${escapeHtml(view.productName)}</strong> for <strong>${formatUsd(view.amount)}</strong> has been processed.</p>
  <p>You will receive your items in-game shortly.</p>
`,
  );
}

export function renderPaymentCancelledPage(shopName: string): string {
  return page(
    'Payment Cancelled',
    shopName,
    `  <h1 style="color: #ffc107;">⚠️ Payment Cancelled</h1>
  <p>Your payment was cancelled. No charges were made.</p>
`,
  );
}

/** Payment went through but the order details read back were unusable */
export function renderPaymentUnverifiedPage(shopName: string, paymentId: string): string {
  return page(
    'Payment Received',
    shopName,
    `  <h1 style="color: #ffc107;">⚠️ Payment Received</h1>
  <p>Your payment was processed, but we could not read the order details.</p>
  <p>Please contact support with transaction ID <strong>${escapeHtml(paymentId)}</strong>.</p>
`,
  );
}

/**
 * Longest username the input may take such that, with any product, the
 * encoded purchase metadata still fits the provider's `custom` field.
 */
export function usernameInputLimit(products: readonly Product[]): number {
  const longestProduct = Math.max(0, ...products.map((product) => encodeURIComponent(product.name).length));
  return Math.max(1, Math.floor((MAX_CUSTOM_LENGTH - 1 - longestProduct) / MAX_ENCODED_CHARS_PER_UNIT));
}

export function renderCatalogPage(shopName: string, products: readonly Product[]): string {
  const cards = products
    .map(
      (product) => `    <div class="product">
      <h2>${escapeHtml(product.name)}</h2>
      <p class="price">${formatUsd(product.price)}</p>
      <p>${escapeHtml(product.description)}</p>
      <button type="button" data-product="${escapeHtml(product.name)}">Buy with PayPal</button>
    </div>`,
    )
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(shopName)}</title>
  <style>
    body { font-family: Arial, sans-serif; background: #1a1a1a; color: #fff; margin: 0; padding: 32px; }
    h1 { text-align: center; }
    .username { display: block; margin: 0 auto 24px; padding: 8px; width: 260px; }
    .products { display: grid; grid-template-columns: repeat(auto-fill, minmax(240px, 1fr)); gap: 16px; }
    .product { background: #262626; border-radius: 8px; padding: 16px; }
    .price { color: #28a745; font-size: 1.4em; font-weight: bold; }
    button { background: #ffc439; border: none; border-radius: 4px; cursor: pointer; padding: 10px 16px; }
    .error { color: #dc3545; text-align: center; min-height: 1.2em; }
  </style>
</head>
<body>
  <h1>${escapeHtml(shopName)}</h1>
  <input class="username" id="username" placeholder="In-game username" maxlength="${usernameInputLimit(products)}" />
  <p class="error" id="error"></p>
  <div class="products">
${cards}
  </div>
  <script>
    document.querySelectorAll('button[data-product]').forEach(function (button) {
      button.addEventListener('click', async function () {
        var error = document.getElementById('error');
        error.textContent = '';
        var username = document.getElementById('username').value.trim();
        try {
          var res = await fetch('/create-payment', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(username ? { product: button.dataset.product, username: username } : { product: button.dataset.product }),
          });
          var data = await res.json();
          if (res.ok && data.approval_url) {
            window.location.href = data.approval_url;
          } else {
            error.textContent = data.error || 'Payment could not be started';
          }
        } catch (e) {
          error.textContent = 'Payment could not be started';
        }
      });
    });
  </script>
</body>
</html>
`;
}
