import { Module } from '@nestjs/common';
import { EventLogModule } from '../event-log/event-log.module';
import { StatusBoardController } from './status-board.controller';
import { StatusBoardService } from './status-board.service';

@Module({
  imports: [EventLogModule],
  controllers: [StatusBoardController],
  providers: [StatusBoardService],
})
export class StatusBoardModule {}
