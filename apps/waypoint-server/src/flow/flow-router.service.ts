import { Inject, Injectable } from '@nestjs/common';
import { FlowCall, FlowRouter } from '@waypoint/engine';
import { FLOW_MODULE_CONFIG, FlowModuleConfig } from './flow.types';

@Injectable()
export class FlowRouterService implements FlowRouter {
  private readonly basePath: string;

  constructor(@Inject(FLOW_MODULE_CONFIG) config: FlowModuleConfig) {
    const trimmed = config.basePath.replace(/^\/+|\/+$/g, '');
    this.basePath = trimmed ? `/${trimmed}` : '';
  }

  resolveGet(label: string): FlowCall {
    return { method: 'GET', url: this.urlFor(label) };
  }

  resolvePost(label: string): FlowCall {
    return { method: 'POST', url: this.urlFor(label) };
  }

  private urlFor(label: string): string {
    return `${this.basePath}/${encodeURIComponent(label)}`;
  }
}
