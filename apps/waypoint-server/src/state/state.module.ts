import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MemoryStateStoreService } from './memory-state-store.service';
import { StateService } from './state.service';
import { STATE_STORE, StateStore } from './state-store.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: STATE_STORE,
      inject: [ConfigService, MemoryStateStoreService],
      useFactory: (configService: ConfigService, memory: MemoryStateStoreService): StateStore => {
        const backend = configService.get<string>('WAYPOINT_STATE_STORE');
        if (!backend) {
          throw new Error('WAYPOINT_STATE_STORE is not set');
        }
        if (backend === 'memory') {
          return memory;
        }
        throw new Error(`Unsupported WAYPOINT_STATE_STORE: ${backend}`);
      },
    },
    MemoryStateStoreService,
    StateService,
  ],
  exports: [STATE_STORE, StateService],
})
export class StateModule {}
