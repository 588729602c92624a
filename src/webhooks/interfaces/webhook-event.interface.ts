export interface WebhookEvent {
  id: string;
  type: string;
  receivedAt: string;
  data: Record<string, unknown>;
  text?: string;
  voiceId?: string;
}
