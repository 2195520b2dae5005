import { All, Controller, Req, Res, UseFilters } from '@nestjs/common';
import type { Request, Response } from 'express';
import { CredentialErrorFilter } from './credential-error.filter';
import { ProxyService } from './proxy.service';
import { UpstreamErrorFilter } from './upstream-error.filter';

@Controller()
@UseFilters(CredentialErrorFilter, UpstreamErrorFilter)
export class ProxyController {
  public constructor(private readonly proxyService: ProxyService) {}

  @All('*')
  public async proxy(@Req() req: Request, @Res() res: Response): Promise<void> {
    await this.proxyService.forward(req, res);
  }
}
