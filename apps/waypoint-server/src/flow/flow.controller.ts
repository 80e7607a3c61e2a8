import { Controller, Get, HttpStatus, Logger, MessageEvent, Param, Post, Req, Res, Sse, UseFilters } from '@nestjs/common';
import { FlowError } from '@waypoint/engine';
import type { Request, Response } from 'express';
import { catchError, from, map, Observable, of } from 'rxjs';
import { FlowExceptionFilter } from './flow-exception.filter';
import { FlowService } from './flow.service';
import { FlowHttpInput, FlowReply, SESSION_HEADER } from './flow.types';

@Controller('flows')
@UseFilters(FlowExceptionFilter)
export class FlowController {
  private readonly logger = new Logger(FlowController.name);

  constructor(private readonly flow: FlowService) {}

  @Get(':label')
  async show(@Param('label') label: string, @Req() req: Request, @Res() res: Response): Promise<void> {
    this.send(res, await this.flow.get(label, toInput(req)));
  }

  @Post(':label')
  async submit(@Param('label') label: string, @Req() req: Request, @Res() res: Response): Promise<void> {
    this.send(res, await this.flow.post(label, toInput(req)));
  }

  /** Incoming messages are the repeated `message` query parameters. */
  @Sse(':label/stream')
  async stream(@Param('label') label: string, @Req() req: Request): Promise<Observable<MessageEvent>> {
    const input = toInput(req);
    const channel = await this.flow.stream(label, input);
    const messages = toMessages(req.query.message);
    return channel(from(messages)).pipe(
      map((data): MessageEvent => ({ data })),
      catchError((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Stream for ${label} failed: ${message}`);
        return of<MessageEvent>({
          type: 'error',
          data: { code: error instanceof FlowError ? error.code : 'stream_failed', message },
        });
      }),
    );
  }

  private send(res: Response, reply: FlowReply): void {
    res.setHeader(SESSION_HEADER, reply.sessionId);
    if (reply.type === 'redirect') {
      res.redirect(HttpStatus.SEE_OTHER, reply.url);
      return;
    }
    const status = reply.view.status === 'invalid' ? HttpStatus.UNPROCESSABLE_ENTITY : HttpStatus.OK;
    res.status(status).json(reply.view);
  }
}

const toInput = (req: Request): FlowHttpInput => {
  const queryIndex = req.originalUrl.indexOf('?');
  return {
    sessionId: req.header(SESSION_HEADER),
    body: req.body,
    query: req.query,
    queryString: queryIndex >= 0 ? req.originalUrl.slice(queryIndex + 1) : undefined,
  };
};

const toMessages = (value: unknown): string[] => {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((item): item is string => typeof item === 'string');
};
