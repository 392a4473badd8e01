import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { RequestContextService } from './request-context.service';
import { randomUUID } from 'crypto';

const REQUEST_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly context: RequestContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers[REQUEST_ID_HEADER];
    const requestId =
      (Array.isArray(header) ? header[0] : header)?.trim() || randomUUID();

    this.context.run({ requestId }, () => {
      res.setHeader(REQUEST_ID_HEADER, requestId);
      next();
    });
  }
}
