import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import type { JwtClaims } from '@shootline/auth';
import type { TxClient } from '@shootline/db';
import { DatabaseService } from './database.service.js';
import { summarizeUser } from '../common/serializers.js';
import type { UserSummary, ViewContext } from '../types.js';

/**
 * One request, one transaction: a stage move and the job it creates commit or
 * roll back together.
 */
@Injectable()
export class RequestContextService {
  constructor(@Inject(DatabaseService) private readonly databaseService: DatabaseService) {}

  async runWithClaims<T>(claims: JwtClaims, fn: (tx: TxClient) => Promise<T>): Promise<T> {
    return this.databaseService.transaction(async (tx) => {
      const actor = await tx.findUserById(claims.user_id);
      if (!actor) {
        throw new UnauthorizedException('USER_NOT_FOUND');
      }
      return fn(tx);
    });
  }

  async runWithView<T>(claims: JwtClaims, fn: (tx: TxClient, view: ViewContext) => Promise<T>): Promise<T> {
    return this.runWithClaims(claims, async (tx) => fn(tx, await this.buildViewContext(tx, claims)));
  }

  async runService<T>(fn: (tx: TxClient) => Promise<T>): Promise<T> {
    return this.databaseService.transaction(fn);
  }

  async buildViewContext(tx: TxClient, claims: JwtClaims): Promise<ViewContext> {
    const users = await tx.listUsers();
    return {
      actor: claims,
      users: new Map<string, UserSummary>(users.map((user) => [user.id, summarizeUser(user)]))
    };
  }
}
