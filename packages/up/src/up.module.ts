import { DynamicModule, Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { UpController } from './up.controller';
import { UP_MODULE_OPTIONS } from './up.decorator';
import type { UpModuleOptions } from './up.interfaces';
import { UpRegistryService } from './up.registry';

const DEFAULT_OPTIONS: UpModuleOptions = { checkTimeoutMs: 2_000 };

@Module({})
export class UpModule {
  public static forRoot(options: Partial<UpModuleOptions> = {}): DynamicModule {
    return {
      module: UpModule,
      imports: [DiscoveryModule],
      controllers: [UpController],
      providers: [
        { provide: UP_MODULE_OPTIONS, useValue: { ...DEFAULT_OPTIONS, ...options } },
        UpRegistryService,
      ],
      exports: [UpRegistryService],
    };
  }
}
