import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  ChannelHandler,
  createSession,
  FlowOutcome,
  handleGet,
  handlePost,
  handleStream,
  validateWorkflow,
  WorkflowConfig,
} from '@waypoint/engine';
import { v4 as uuidv4 } from 'uuid';
import { StateService } from '../state/state.service';
import { FlowRouterService } from './flow-router.service';
import {
  FLOW_MODULE_CONFIG,
  FlowHttpInput,
  FlowHttpRequest,
  FlowModuleConfig,
  FlowReply,
  FlowView,
} from './flow.types';

@Injectable()
export class FlowService implements OnModuleInit {
  private readonly logger = new Logger(FlowService.name);
  private readonly engine: WorkflowConfig<unknown, FlowHttpRequest, FlowView>;

  constructor(
    @Inject(FLOW_MODULE_CONFIG) private readonly config: FlowModuleConfig,
    router: FlowRouterService,
    private readonly stateService: StateService,
  ) {
    this.engine = {
      workflow: config.workflow,
      router,
      logger: this.logger,
    };
  }

  onModuleInit(): void {
    if (!this.config.validateOnBoot) {
      return;
    }
    const paths = validateWorkflow(this.config.workflow, this.config.samples ?? []);
    for (const path of paths) {
      this.logger.log(`Validated path ${path.labels.join(' -> ')}${path.finished ? ' (finished)' : ''}`);
    }
  }

  async get(label: string, input: FlowHttpInput): Promise<FlowReply> {
    const request = await this.toRequest(input);
    return this.settle(request, input, await handleGet(this.engine, label, request));
  }

  async post(label: string, input: FlowHttpInput): Promise<FlowReply> {
    const request = await this.toRequest(input);
    return this.settle(request, input, await handlePost(this.engine, label, request));
  }

  async stream(label: string, input: FlowHttpInput): Promise<ChannelHandler> {
    return handleStream(this.engine, label, await this.toRequest(input));
  }

  private async toRequest(input: FlowHttpInput): Promise<FlowHttpRequest> {
    const sessionId = input.sessionId || uuidv4();
    const entries = input.sessionId ? await this.stateService.getEntries(sessionId) : {};
    return {
      sessionId,
      session: createSession(entries),
      body: toRecord(input.body),
      query: toQuery(input.query),
    };
  }

  private async settle(
    request: FlowHttpRequest,
    input: FlowHttpInput,
    outcome: FlowOutcome<FlowView>,
  ): Promise<FlowReply> {
    if (outcome.type === 'respond') {
      return { type: 'view', sessionId: request.sessionId, view: outcome.response };
    }

    if (outcome.session.size === 0) {
      await this.stateService.clearState(request.sessionId);
    } else {
      await this.stateService.saveEntries(request.sessionId, outcome.session.entries(), this.config.sessionTtlSeconds);
    }
    const url =
      outcome.carryQuery && input.queryString ? `${outcome.location.url}?${input.queryString}` : outcome.location.url;
    return { type: 'redirect', sessionId: request.sessionId, url };
  }
}

const toRecord = (body: unknown): Record<string, unknown> => {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
};

const toQuery = (query?: Record<string, unknown>): Record<string, string[]> => {
  const result: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(query ?? {})) {
    const values = Array.isArray(value) ? value : [value];
    const strings = values.filter((item): item is string => typeof item === 'string');
    if (strings.length > 0) {
      result[key] = strings;
    }
  }
  return result;
};
