import { Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { GetStatusViewDto } from './dto/get-status-view.dto';
import {
  EventLogSourceSummary,
  StatusBoardService,
  StatusBoardView,
} from './status-board.service';

@Controller('status')
export class StatusBoardController {
  constructor(private readonly statusBoardService: StatusBoardService) {}

  @Get()
  async view(@Query() query: GetStatusViewDto): Promise<StatusBoardView> {
    return this.statusBoardService.getView(query);
  }

  @Post('refresh')
  @HttpCode(200)
  async refresh(): Promise<EventLogSourceSummary> {
    return this.statusBoardService.refresh();
  }
}
