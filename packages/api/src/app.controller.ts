import { Controller, Get, Redirect } from '@nestjs/common';

export const FRONT_END_ENTRY = '/static/index.html';

@Controller()
export class AppController {
  @Get()
  @Redirect(FRONT_END_ENTRY, 307)
  root(): void {}

  @Get('health')
  health(): { ok: boolean } {
    return { ok: true };
  }
}
