import { Controller, Get, Inject } from '@nestjs/common';
import type { AppEnv } from '@shootline/config';
import { Public } from '../auth/public.decorator.js';

@Controller('meta')
export class MetaController {
  constructor(@Inject('APP_ENV') private readonly env: AppEnv) {}

  @Get()
  @Public()
  getMeta() {
    return {
      app: 'shootline',
      service: 'api',
      env: this.env.NODE_ENV,
      git_sha: this.env.GIT_SHA ?? 'unknown',
      build_time: this.env.BUILD_TIME ?? null,
      task_workflow: this.env.TASK_STATUSES ? 'custom' : this.env.TASK_WORKFLOW,
      profit_share_policy: this.env.PROFIT_SHARE_POLICY
    };
  }
}
