/**
 * How a failed voice synthesis call affects the webhook response.
 *
 * `best-effort` acknowledges before the call settles and only logs failures.
 * `required` awaits the call and fails the webhook with 502 when it fails.
 */
export type VoiceForwardMode = 'best-effort' | 'required';

export interface VoiceApiConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey?: string;
  voiceId?: string;
  modelId: string;
  timeoutMs: number;
  forwardMode: VoiceForwardMode;
}

export interface IntakeConfig {
  /** Expected value of the `x-webhook-secret` header; unset disables the check. */
  sharedSecret?: string;
  voice: VoiceApiConfig;
}
