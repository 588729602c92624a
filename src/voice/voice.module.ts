import { Module } from '@nestjs/common';
import { VoiceSynthesisService } from './voice-synthesis.service';

@Module({
  providers: [VoiceSynthesisService],
  exports: [VoiceSynthesisService],
})
export class VoiceModule {}
