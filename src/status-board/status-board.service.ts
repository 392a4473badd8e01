import {
  Injectable,
  Logger,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClockService } from '../common/clock.service';
import { AppConfig } from '../config/app.config';
import { RequestContextService } from '../context/request-context.service';
import { EventLogUnavailableError } from '../event-log/event-log.errors';
import { EventLogService, EventLogSnapshot } from '../event-log/event-log.service';
import { GetStatusViewDto } from './dto/get-status-view.dto';
import { TimestampSchemaError } from './timestamp-normalizer';
import { resolveWindowMode } from './window-filter';
import { StatusView, ViewOptions, buildStatusView } from './view-assembler';

export interface EventLogSourceSummary {
  kind: 'remote' | 'local';
  location: string;
  modifiedAt: string | null;
  fetchedAt: string;
  recordCount: number;
}

export interface StatusBoardView extends StatusView {
  source: EventLogSourceSummary;
  /** True when the log could not be loaded and the previous snapshot was used. */
  stale: boolean;
  error: string | null;
}

@Injectable()
export class StatusBoardService {
  private readonly logger = new Logger(StatusBoardService.name);
  private readonly defaults: AppConfig['statusBoard'];
  private lastSnapshot: EventLogSnapshot | null = null;

  constructor(
    private readonly eventLog: EventLogService,
    private readonly clock: ClockService,
    private readonly requestContext: RequestContextService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.defaults = configService.get('statusBoard', { infer: true });
  }

  async getView(query: GetStatusViewDto): Promise<StatusBoardView> {
    const { snapshot, error } = await this.loadSnapshot();
    const options = this.resolveOptions(query);
    const requestId = this.requestContext.context.requestId;

    let view: StatusView;
    try {
      view = buildStatusView(snapshot.records, this.clock.now(), options);
    } catch (cause) {
      if (cause instanceof TimestampSchemaError) {
        this.logger.error(`[${requestId}] ${cause.message}`);
        throw new UnprocessableEntityException(cause.message);
      }
      throw cause;
    }

    const { droppedRecords, droppedByReason, totalRecords } = view.summary;
    if (droppedRecords > 0) {
      const breakdown = Object.entries(droppedByReason)
        .map(([reason, count]) => `${reason}: ${count}`)
        .join(', ');
      this.logger.warn(
        `[${requestId}] Dropped ${droppedRecords} of ${totalRecords} records (${breakdown})`,
      );
    }

    return {
      ...view,
      source: this.describe(snapshot),
      stale: error !== null,
      error,
    };
  }

  async refresh(): Promise<EventLogSourceSummary> {
    try {
      const snapshot = await this.eventLog.refresh();
      this.remember(snapshot);
      return this.describe(snapshot);
    } catch (error) {
      if (error instanceof EventLogUnavailableError) {
        this.logger.error(`[${this.requestContext.context.requestId}] ${error.message}`);
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }

  private async loadSnapshot(): Promise<{
    snapshot: EventLogSnapshot;
    error: string | null;
  }> {
    try {
      const snapshot = await this.eventLog.load();
      this.remember(snapshot);
      return { snapshot, error: null };
    } catch (error) {
      if (!(error instanceof EventLogUnavailableError)) {
        throw error;
      }

      const requestId = this.requestContext.context.requestId;
      this.logger.error(`[${requestId}] ${error.message}`);
      if (!this.lastSnapshot) {
        throw new ServiceUnavailableException(error.message);
      }

      this.logger.warn(
        `[${requestId}] Serving snapshot fetched at ${this.lastSnapshot.fetchedAt.toISOString()}`,
      );
      return { snapshot: this.lastSnapshot, error: error.message };
    }
  }

  private remember(snapshot: EventLogSnapshot): void {
    if (
      !this.lastSnapshot ||
      snapshot.fetchedAt.getTime() >= this.lastSnapshot.fetchedAt.getTime()
    ) {
      this.lastSnapshot = snapshot;
    }
  }

  private resolveOptions(query: GetStatusViewDto): ViewOptions {
    const defaults = this.defaults;
    const requestedWindow = query.window ?? defaults.defaultWindow;
    const window =
      query.todayOnly === undefined
        ? requestedWindow
        : resolveWindowMode({
            anchored: requestedWindow !== 'none',
            todayOnly: query.todayOnly,
          });
    return {
      zone: {
        timeZone: defaults.displayTimeZone,
        label: defaults.displayTimeZoneLabel,
      },
      policy: defaults.ambiguityPolicy,
      view: query.view ?? defaults.defaultView,
      window,
      anchorWeekday: defaults.windowAnchorWeekday,
      rollbackOnAnchorDay: defaults.rollbackOnAnchorDay,
      preferToday: query.preferToday ?? defaults.preferToday,
      leftForDayMarker: defaults.leftForDayMarker,
    };
  }

  private describe(snapshot: EventLogSnapshot): EventLogSourceSummary {
    return {
      kind: snapshot.source.kind,
      location: snapshot.source.location,
      modifiedAt: snapshot.source.modifiedAt?.toISOString() ?? null,
      fetchedAt: snapshot.fetchedAt.toISOString(),
      recordCount: snapshot.records.length,
    };
  }
}
