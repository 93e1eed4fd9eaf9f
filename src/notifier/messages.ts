import { formatUsd } from '../utils/format';

export interface PurchaseReport {
  username: string;
  item: string;
  price: number;
}

export interface PaymentSuccess {
  username: string;
  productName: string;
  amount: number;
  transactionId: string;
}

export function formatPurchaseMessage(report: PurchaseReport): string {
  return [
    '🛒 **Purchase Made!**',
    `👤 **Username:** ${report.username}`,
    `📦 **Item:** ${report.item}`,
    `💰 **Price:** ${formatUsd(report.price)}`,
  ].join('\n');
}

export function formatPaymentSuccessMessage(payment: PaymentSuccess): string {
  return [
    '💰 **Payment Successful!**',
    `👤 **Username:** ${payment.username}`,
    `📦 **Product:** ${payment.productName}`,
    `💳 **Amount:** ${formatUsd(payment.amount)}`,
    `🆔 **PayPal Transaction:** ${payment.transactionId}`,
  ].join('\n');
}
