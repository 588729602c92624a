import { Module, Global } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';

const prettyPrint = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRoot({
      pinoHttp: {
        transport: prettyPrint
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname',
                singleLine: true,
              },
            }
          : undefined,
        level: process.env.LOG_LEVEL ?? 'info',
        redact: ['req.headers["x-webhook-secret"]'],
        customProps: () => ({
          context: 'HTTP',
        }),
      },
    }),
  ],
  exports: [PinoLoggerModule],
})
export class AppLoggerModule {}
