import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClockService } from './common/clock.service';
import { AppConfig } from './config/app.config';
import { EventLogService } from './event-log/event-log.service';

export interface HealthStatus {
  status: 'ok';
  environment: string;
  timestamp: string;
  eventLog: {
    location: string;
    cacheExpiresAt: string | null;
  };
}

@Injectable()
export class AppService {
  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {}

  getHealth(): HealthStatus {
    const expiresAt = this.eventLog.cacheExpiresAt;
    return {
      status: 'ok',
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      timestamp: this.clock.now().toISOString(),
      eventLog: {
        location: this.eventLog.location,
        cacheExpiresAt: expiresAt ? expiresAt.toISOString() : null,
      },
    };
  }
}
