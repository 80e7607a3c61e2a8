import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Inject, Logger } from '@nestjs/common';
import { FlowError, FlowErrorCode, MissingStepValueError, RESTART_LABEL } from '@waypoint/engine';
import type { Response } from 'express';
import { FlowRouterService } from './flow-router.service';
import { FLOW_MODULE_CONFIG, FlowModuleConfig } from './flow.types';

const STATUS_BY_CODE: Record<FlowErrorCode, HttpStatus> = {
  missing_step_value: HttpStatus.CONFLICT,
  decode_failed: HttpStatus.UNPROCESSABLE_ENTITY,
  encode_failed: HttpStatus.INTERNAL_SERVER_ERROR,
  unsupported_stream: HttpStatus.BAD_REQUEST,
  flow_exhausted: HttpStatus.INTERNAL_SERVER_ERROR,
  duplicate_label: HttpStatus.INTERNAL_SERVER_ERROR,
  invalid_label: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Turns engine errors into JSON error bodies, or a restart redirect when configured. */
@Catch(FlowError)
export class FlowExceptionFilter implements ExceptionFilter<FlowError> {
  private readonly logger = new Logger(FlowExceptionFilter.name);

  constructor(
    @Inject(FLOW_MODULE_CONFIG) private readonly config: FlowModuleConfig,
    private readonly router: FlowRouterService,
  ) {}

  catch(exception: FlowError, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    if (exception instanceof MissingStepValueError && this.config.restartOnMissingStep) {
      this.logger.warn(`${exception.message}; restarting`);
      res.redirect(HttpStatus.SEE_OTHER, this.router.resolveGet(RESTART_LABEL).url);
      return;
    }

    const status = STATUS_BY_CODE[exception.code];
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.warn(exception.message);
    }
    res.status(status).json({
      statusCode: status,
      error: {
        code: exception.code,
        message: exception.message,
        ...(exception.label ? { label: exception.label } : {}),
      },
    });
  }
}
