import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './configuration';
import { intakeConfigProvider, INTAKE_CONFIG } from './intake-config.provider';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
  ],
  providers: [intakeConfigProvider],
  exports: [INTAKE_CONFIG],
})
export class AppConfigModule {}
