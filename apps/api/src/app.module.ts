import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { loadEnv, type AppEnv } from '@shootline/config';
import { createJsonLogger } from '@shootline/common';
import { createDatabase } from '@shootline/db';
import { HealthController } from './common/health.controller.js';
import { MetaController } from './common/meta.controller.js';
import { RequestIdMiddleware } from './common/request-id.middleware.js';
import { loadWorkflowConfig } from './common/workflow-config.js';
import { AuthController } from './auth/auth.controller.js';
import { JwtAuthGuard } from './auth/jwt-auth.guard.js';
import { DatabaseService } from './db/database.service.js';
import { RequestContextService } from './db/request-context.service.js';
import { UsersController } from './users/users.controller.js';
import { UsersService } from './users/users.service.js';
import { ClientsController } from './clients/clients.controller.js';
import { ClientsService } from './clients/clients.service.js';
import { DealsController } from './deals/deals.controller.js';
import { DealsService } from './deals/deals.service.js';
import { ProfitShareService } from './ledger/profit-share.service.js';
import { JobsController } from './production/jobs.controller.js';
import { TasksController } from './production/tasks.controller.js';
import { ProductionService } from './production/production.service.js';
import { ReportingController } from './reporting/reporting.controller.js';
import { ReportingService } from './reporting/reporting.service.js';

@Module({
  controllers: [
    HealthController,
    MetaController,
    AuthController,
    UsersController,
    ClientsController,
    DealsController,
    JobsController,
    TasksController,
    ReportingController
  ],
  providers: [
    {
      provide: 'APP_ENV',
      useFactory: () => loadEnv(process.env)
    },
    {
      provide: 'APP_LOGGER',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => createJsonLogger(env.LOG_LEVEL)
    },
    {
      provide: DatabaseService,
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) =>
        new DatabaseService(createDatabase({ driver: env.DATA_DRIVER, url: env.DATABASE_URL }))
    },
    {
      provide: 'JWT_SECRET_VALUE',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => env.JWT_SECRET
    },
    {
      provide: 'JWT_TTL_SECONDS',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => env.JWT_TTL_SECONDS
    },
    {
      provide: 'WORKFLOW_CONFIG',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => loadWorkflowConfig(env)
    },
    RequestContextService,
    UsersService,
    ClientsService,
    ProductionService,
    DealsService,
    ProfitShareService,
    ReportingService,
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard
    }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
