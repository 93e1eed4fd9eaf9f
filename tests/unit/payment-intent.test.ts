import { buildPaymentIntent, findApprovalUrl, redirectUrlsFor, toSku } from '../../src/payments/payment-intent';
import { encodeCustomMetadata } from '../../src/payments/custom-metadata';

describe('payment intent', () => {
  const mod = { name: 'Mod', price: 3, description: 'Get Fly, Larger Anti-Raid Zone, Teleport and Mod Kits' };

  it('should build a single-item sale for Mod bought by alice', () => {
    const custom = encodeCustomMetadata({ username: 'alice', productName: 'Mod' });
    const intent = buildPaymentIntent(mod, 'alice', custom, redirectUrlsFor('https://shop.test'));

    expect(intent.intent).toBe('sale');
    expect(intent.payer).toEqual({ payment_method: 'paypal' });
    expect(intent.redirect_urls).toEqual({
      return_url: 'https://shop.test/execute-payment',
      cancel_url: 'https://shop.test/cancel-payment',
    });
    expect(intent.transactions).toHaveLength(1);

    const [tx] = intent.transactions;
    expect(tx.item_list.items).toEqual([
      {
        name: 'Mod',
        sku: 'mod',
        price: '3.00',
        currency: 'USD',
        quantity: 1,
        description: 'Get Fly, Larger Anti-Raid Zone, Teleport and Mod Kits',
      },
    ]);
    expect(tx.amount).toEqual({ total: '3.00', currency: 'USD' });
    expect(tx.custom).toBe('alice|Mod');
    expect(tx.description).toBe('Mod purchase for alice');
  });

  it('should replace every space in the sku', () => {
    expect(toSku('Ultra Server Rank Package')).toBe('ultra_server_rank_package');
    expect(toSku('Mod+')).toBe('mod+');
  });

  it('should strip trailing slashes from the base URL', () => {
    expect(redirectUrlsFor('http://localhost:5000/')).toEqual({
      returnUrl: 'http://localhost:5000/execute-payment',
      cancelUrl: 'http://localhost:5000/cancel-payment',
    });
  });

  it('should find the approval link by rel', () => {
    const links = [
      { href: 'https://api.test/self', rel: 'self' },
      { href: 'https://checkout.test/approve', rel: 'approval_url', method: 'REDIRECT' },
    ];
    expect(findApprovalUrl(links)).toBe('https://checkout.test/approve');
    expect(findApprovalUrl([{ href: 'https://api.test/self', rel: 'self' }])).toBeUndefined();
  });
});
