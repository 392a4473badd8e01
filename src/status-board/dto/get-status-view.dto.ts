import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsOptional } from 'class-validator';
import {
  VIEW_MODES,
  ViewMode,
  WINDOW_MODES,
  WindowMode,
} from '../status-board.types';

// Anything other than true/false is passed on unchanged for @IsBoolean to reject.
function toBoolean(value: unknown): unknown {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  if (typeof value === 'string') {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
  }

  return value;
}

export class GetStatusViewDto {
  @IsOptional()
  @IsIn(VIEW_MODES)
  view?: ViewMode;

  @IsOptional()
  @IsIn(WINDOW_MODES)
  window?: WindowMode;

  // Read from the raw query: implicit conversion would turn "false" into true.
  @IsOptional()
  @Transform(({ obj, key }) => toBoolean(obj[key]))
  @IsBoolean()
  preferToday?: boolean;

  /** Narrows the requested window to today; wins over `window`. */
  @IsOptional()
  @Transform(({ obj, key }) => toBoolean(obj[key]))
  @IsBoolean()
  todayOnly?: boolean;
}
