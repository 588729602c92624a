import { ConfigService } from '@nestjs/config';
import configuration from './configuration';
import { buildIntakeConfig } from './intake-config.provider';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('VOICE_') || key === 'WEBHOOK_SECRET' || key === 'ALLOWED_ORIGINS') {
        delete process.env[key];
      }
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  const buildFromEnv = () => buildIntakeConfig(new ConfigService(configuration()));

  it('fills the struct with schema defaults', () => {
    expect(buildFromEnv()).toEqual({
      sharedSecret: undefined,
      voice: {
        enabled: false,
        baseUrl: 'https://api.elevenlabs.io',
        apiKey: undefined,
        voiceId: undefined,
        modelId: 'eleven_multilingual_v2',
        timeoutMs: 5000,
        forwardMode: 'best-effort',
      },
    });
  });

  it('uses the converted boolean for an upper-case flag', () => {
    process.env.VOICE_ENABLED = 'TRUE';

    expect(buildFromEnv().voice.enabled).toBe(true);
  });

  it('uses the converted number for an exponent timeout', () => {
    process.env.VOICE_TIMEOUT_MS = '1e3';

    expect(buildFromEnv().voice.timeoutMs).toBe(1000);
  });

  it('treats blank secrets and keys as unset', () => {
    process.env.WEBHOOK_SECRET = '';
    process.env.VOICE_API_KEY = '';

    const config = buildFromEnv();

    expect(config.sharedSecret).toBeUndefined();
    expect(config.voice.apiKey).toBeUndefined();
  });

  it('splits allowed origins', () => {
    process.env.ALLOWED_ORIGINS = 'https://a.example, https://b.example,';

    expect(configuration().cors.origins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('throws on a value the schema rejects', () => {
    process.env.VOICE_TIMEOUT_MS = '50';

    expect(() => configuration()).toThrow(
      'Config validation error: "VOICE_TIMEOUT_MS" must be greater than or equal to 100',
    );
  });
});
