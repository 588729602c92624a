/**
 * `skipped`: nothing to forward, or forwarding is off.
 * `dispatched`: best-effort call started, outcome only logged.
 * `delivered`: required-mode call completed successfully.
 */
export type ForwardingOutcome = 'skipped' | 'dispatched' | 'delivered';

export interface WebhookAcknowledgement {
  status: 'received';
  id: string;
  forwarding: ForwardingOutcome;
}
