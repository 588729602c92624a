import { Injectable } from '@nestjs/common';
import { VoiceSynthesisService } from '../voice/voice-synthesis.service';

export interface HealthReport {
  status: 'ok';
  timestamp: string;
  services: {
    voice: { status: 'configured' | 'disabled' };
  };
}

@Injectable()
export class HealthService {
  constructor(private readonly voiceService: VoiceSynthesisService) {}

  check(): HealthReport {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      services: {
        voice: { status: this.voiceService.isEnabled() ? 'configured' : 'disabled' },
      },
    };
  }
}
