import { Inject, Injectable, Logger } from '@nestjs/common';
import { INTAKE_CONFIG } from '../config/intake-config.provider';
import { IntakeConfig } from '../config/interfaces/intake-config.interface';
import {
  VoiceSynthesisRequest,
  VoiceSynthesisResult,
} from './interfaces/voice-synthesis.interface';

@Injectable()
export class VoiceSynthesisService {
  private readonly logger = new Logger(VoiceSynthesisService.name);

  constructor(@Inject(INTAKE_CONFIG) private readonly config: IntakeConfig) {}

  isEnabled(): boolean {
    const { enabled, apiKey, voiceId } = this.config.voice;
    return enabled && Boolean(apiKey) && Boolean(voiceId);
  }

  /**
   * Sends one text-to-speech request. Never rejects: network errors, non-2xx
   * responses and timeouts come back as `success: false`.
   */
  async synthesize(request: VoiceSynthesisRequest): Promise<VoiceSynthesisResult> {
    const { baseUrl, apiKey, modelId, timeoutMs } = this.config.voice;
    const voiceId = request.voiceId ?? this.config.voice.voiceId ?? '';
    const timestamp = new Date().toISOString();
    const startedAt = Date.now();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    const fail = (statusCode: number | null, error: string): VoiceSynthesisResult => {
      this.logger.warn(`Voice synthesis for event ${request.eventId} failed: ${error}`);
      return {
        eventId: request.eventId,
        success: false,
        statusCode,
        audioBytes: null,
        error,
        durationMs: Date.now() - startedAt,
        timestamp,
      };
    };

    try {
      const response = await fetch(
        `${baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
            'xi-api-key': apiKey ?? '',
          },
          body: JSON.stringify({ text: request.text, model_id: modelId }),
          signal: controller.signal,
        },
      );

      if (!response.ok) {
        return fail(response.status, `Voice API responded with status ${response.status}`);
      }

      const audio = await response.arrayBuffer();
      this.logger.log(
        `Synthesized ${audio.byteLength} bytes of audio for event ${request.eventId}`,
      );

      return {
        eventId: request.eventId,
        success: true,
        statusCode: response.status,
        audioBytes: audio.byteLength,
        error: null,
        durationMs: Date.now() - startedAt,
        timestamp,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        return fail(null, `Voice API request timed out after ${timeoutMs}ms`);
      }
      return fail(null, error instanceof Error ? error.message : 'Voice API request failed');
    } finally {
      clearTimeout(timeout);
    }
  }
}
