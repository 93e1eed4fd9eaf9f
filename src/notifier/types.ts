export interface Notifier {
  /** False when no webhook URL is set; `notify` then throws NotConfigured */
  readonly configured: boolean;
  notify(message: string): Promise<void>;
}
