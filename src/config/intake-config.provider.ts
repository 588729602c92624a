import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IntakeConfig, VoiceForwardMode } from './interfaces/intake-config.interface';

export const INTAKE_CONFIG = Symbol('INTAKE_CONFIG');

export const buildIntakeConfig = (configService: ConfigService): IntakeConfig => {
  const config: IntakeConfig = {
    sharedSecret: configService.get<string>('webhook.secret'),
    voice: {
      enabled: configService.getOrThrow<boolean>('voice.enabled'),
      baseUrl: configService.getOrThrow<string>('voice.apiUrl').replace(/\/+$/, ''),
      apiKey: configService.get<string>('voice.apiKey'),
      voiceId: configService.get<string>('voice.voiceId'),
      modelId: configService.getOrThrow<string>('voice.modelId'),
      timeoutMs: configService.getOrThrow<number>('voice.timeoutMs'),
      forwardMode: configService.getOrThrow<VoiceForwardMode>('voice.forwardMode'),
    },
  };

  Object.freeze(config.voice);
  return Object.freeze(config);
};

export const intakeConfigProvider: Provider = {
  provide: INTAKE_CONFIG,
  inject: [ConfigService],
  useFactory: (configService: ConfigService) => buildIntakeConfig(configService),
};
