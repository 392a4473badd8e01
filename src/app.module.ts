import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ClockModule } from './common/clock.module';
import { configuration } from './config/app.config';
import { validateEnv } from './config/env.validation';
import { RequestContextMiddleware } from './context/request-context.middleware';
import { RequestContextModule } from './context/request-context.module';
import { EventLogModule } from './event-log/event-log.module';
import { StatusBoardModule } from './status-board/status-board.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.local'],
      validate: (config) => {
        const validated = validateEnv(config);
        return { ...config, ...validated };
      },
      load: [configuration],
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: 120,
      },
    ]),
    RequestContextModule,
    ClockModule,
    EventLogModule,
    StatusBoardModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
