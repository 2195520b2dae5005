import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
  VERSION_NEUTRAL,
} from '@nestjs/common';
import type { UptimeSummary } from './up.interfaces';
import { UpRegistryService } from './up.registry';

@Controller({ path: 'up', version: VERSION_NEUTRAL })
export class UpController {
  public constructor(private readonly registry: UpRegistryService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  public async up(): Promise<UptimeSummary> {
    const summary = await this.registry.runAllChecks();
    if (summary.status === 'down') {
      throw new ServiceUnavailableException(summary);
    }
    return summary;
  }
}
