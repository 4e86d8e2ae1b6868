// ============================================================
// Clickgraph — Proxy Controller
// Routes: every method, every path
//
// The body arrives as a raw Buffer (see proxy.main.ts) and the
// upstream response is written back byte for byte.
// ============================================================

import { All, Controller, Req, Res, UseGuards } from '@nestjs/common';
import { Request, Response } from 'express';
import { ProxyService } from './proxy.service';
import { SharedSecretGuard } from '../auth/guards/shared-secret.guard';

@Controller()
@UseGuards(SharedSecretGuard)
export class ProxyController {
  constructor(private readonly proxyService: ProxyService) {}

  @All('*')
  async forward(@Req() req: Request, @Res() res: Response): Promise<void> {
    const body: unknown = req.body;
    const relayed = await this.proxyService.forward({
      method: req.method,
      url: req.originalUrl,
      headers: req.headers,
      body: Buffer.isBuffer(body) && body.length > 0 ? body : undefined,
    });

    res.status(relayed.status);
    for (const [name, value] of Object.entries(relayed.headers)) {
      res.setHeader(name, value);
    }
    res.end(relayed.body);
  }
}
