import { Module } from '@nestjs/common';
import { VoiceModule } from '../voice/voice.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [VoiceModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
