import * as Joi from 'joi';
import { VoiceForwardMode } from './interfaces/intake-config.interface';

export interface EnvironmentVariables {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: string;
  WEBHOOK_SECRET?: string;
  VOICE_ENABLED: boolean;
  VOICE_API_URL: string;
  VOICE_API_KEY?: string;
  VOICE_ID?: string;
  VOICE_MODEL_ID: string;
  VOICE_TIMEOUT_MS: number;
  VOICE_FORWARD_MODE: VoiceForwardMode;
  ALLOWED_ORIGINS?: string;
}

export const validationSchema = Joi.object<EnvironmentVariables>({
  NODE_ENV: Joi.string().valid('development', 'test', 'production').default('development'),
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string()
    .valid('trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent')
    .default('info'),
  WEBHOOK_SECRET: Joi.string().min(16).allow('').optional(),
  VOICE_ENABLED: Joi.boolean().default(false),
  VOICE_API_URL: Joi.string().uri().default('https://api.elevenlabs.io'),
  VOICE_API_KEY: Joi.string().allow('').optional(),
  VOICE_ID: Joi.string().allow('').optional(),
  VOICE_MODEL_ID: Joi.string().default('eleven_multilingual_v2'),
  VOICE_TIMEOUT_MS: Joi.number().integer().min(100).max(60000).default(5000),
  VOICE_FORWARD_MODE: Joi.string().valid('best-effort', 'required').default('best-effort'),
  ALLOWED_ORIGINS: Joi.string().allow('').optional(),
});
