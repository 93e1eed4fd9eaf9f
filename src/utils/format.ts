/** `3` → `$3.00` */
export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/** Fixed-point string the payment provider expects for amounts */
export function toDecimalString(amount: number): string {
  return amount.toFixed(2);
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Timeout rejections from `AbortSignal.timeout` surface as a DOMException named TimeoutError */
export function isTimeoutError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'TimeoutError' || err.name === 'AbortError';
}
