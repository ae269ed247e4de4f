import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  private readonly startedAt = Date.now();

  @Get('health')
  health() {
    return {
      status: 'ok',
      service: 'symptom-triage',
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
    };
  }
}
