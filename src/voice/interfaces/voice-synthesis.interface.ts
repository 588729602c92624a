export interface VoiceSynthesisRequest {
  eventId: string;
  text: string;
  voiceId?: string;
}

export interface VoiceSynthesisResult {
  eventId: string;
  success: boolean;
  statusCode: number | null;
  audioBytes: number | null;
  error: string | null;
  durationMs: number;
  timestamp: string;
}
