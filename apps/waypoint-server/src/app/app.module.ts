import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { FlowModule } from '../flow/flow.module';
import { FlowWorkflow } from '../flow/flow.types';
import { SIGNUP_SAMPLES } from '../signup/signup-samples';
import { SIGNUP_WORKFLOW, SignupModule } from '../signup/signup.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: 'apps/waypoint-server/.env',
    }),
    FlowModule.forFeatureAsync({
      imports: [SignupModule],
      inject: [ConfigService, SIGNUP_WORKFLOW],
      useFactory: (configService: ConfigService, workflow: FlowWorkflow) => ({
        workflow,
        basePath: `${configService.get<string>('WAYPOINT_GLOBAL_PREFIX') ?? 'api'}/flows`,
        sessionTtlSeconds: parseNumber(configService.get<string>('WAYPOINT_SESSION_TTL_SECONDS')),
        validateOnBoot: configService.get<string>('WAYPOINT_VALIDATE_ON_BOOT') === 'true',
        restartOnMissingStep: configService.get<string>('WAYPOINT_RESTART_ON_MISSING_STEP') === 'true',
        samples: SIGNUP_SAMPLES,
      }),
    }),
  ],
})
export class AppModule {}

export const parseNumber = (value?: string): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};
