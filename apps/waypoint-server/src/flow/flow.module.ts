import { DynamicModule, Module } from '@nestjs/common';
import { InjectionToken } from '@nestjs/common/interfaces/modules/injection-token.interface';
import { StateModule } from '../state/state.module';
import { FlowExceptionFilter } from './flow-exception.filter';
import { FlowRouterService } from './flow-router.service';
import { FlowController } from './flow.controller';
import { FlowService } from './flow.service';
import { FLOW_MODULE_CONFIG, FlowModuleConfig } from './flow.types';

export type FlowModuleAsyncOptions = {
  imports?: DynamicModule['imports'];
  inject?: Array<InjectionToken>;
  useFactory: (...args: Array<never>) => FlowModuleConfig | Promise<FlowModuleConfig>;
};

const FLOW_PROVIDERS = [FlowRouterService, FlowService, FlowExceptionFilter];

@Module({})
export class FlowModule {
  static forFeature(config: FlowModuleConfig): DynamicModule {
    return {
      module: FlowModule,
      imports: [StateModule],
      controllers: [FlowController],
      providers: [
        {
          provide: FLOW_MODULE_CONFIG,
          useValue: config,
        },
        ...FLOW_PROVIDERS,
      ],
      exports: [FlowService],
    };
  }

  static forFeatureAsync(options: FlowModuleAsyncOptions): DynamicModule {
    return {
      module: FlowModule,
      imports: [StateModule, ...(options.imports ?? [])],
      controllers: [FlowController],
      providers: [
        {
          provide: FLOW_MODULE_CONFIG,
          inject: options.inject ?? [],
          useFactory: options.useFactory,
        },
        ...FLOW_PROVIDERS,
      ],
      exports: [FlowService],
    };
  }
}
