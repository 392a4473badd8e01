import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContext {
  requestId: string;
}

@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContext>();

  run(context: Partial<RequestContext>, callback: () => void) {
    const payload: RequestContext = {
      requestId: context.requestId ?? randomUUID(),
    };
    this.storage.run(payload, callback);
  }

  get context(): RequestContext {
    return this.storage.getStore() ?? { requestId: randomUUID() };
  }
}
