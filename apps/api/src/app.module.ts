import {
  Module,
  RequestMethod,
  type MiddlewareConsumer,
  type NestModule,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MailModule } from '@mail/presentation/mail.module';
import { PlatformModule } from '@platform/platform.module';
import { TraceContextMiddleware } from '@platform/infrastructure/tracing/trace-context.middleware';
import { RegistrationModule } from '@registration/presentation/registration.module';
import { StaffModule } from '@staff/presentation/staff.module';
import { UsersModule } from '@users/presentation/users.module';
import { validateConfig } from './config/app.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateConfig,
    }),
    PlatformModule,
    UsersModule,
    RegistrationModule,
    StaffModule,
    MailModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(TraceContextMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
