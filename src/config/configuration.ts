import { validationSchema } from './validation.schema';

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value : undefined;

/**
 * Validates the environment when the config is loaded, so every value below
 * is the Joi-converted one and defaults live only in the schema.
 */
export default () => {
  const { error, value: env } = validationSchema.validate(process.env, {
    allowUnknown: true,
    abortEarly: false,
  });
  if (error) {
    throw new Error(`Config validation error: ${error.message}`);
  }

  return {
    app: {
      port: env.PORT,
    },
    webhook: {
      secret: blankToUndefined(env.WEBHOOK_SECRET),
    },
    voice: {
      enabled: env.VOICE_ENABLED,
      apiUrl: env.VOICE_API_URL,
      apiKey: blankToUndefined(env.VOICE_API_KEY),
      voiceId: blankToUndefined(env.VOICE_ID),
      modelId: env.VOICE_MODEL_ID,
      timeoutMs: env.VOICE_TIMEOUT_MS,
      forwardMode: env.VOICE_FORWARD_MODE,
    },
    cors: {
      origins:
        blankToUndefined(env.ALLOWED_ORIGINS)
          ?.split(',')
          .map((origin) => origin.trim())
          .filter(Boolean) ?? [],
    },
  };
};
