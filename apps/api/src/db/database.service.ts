import { Injectable, OnModuleDestroy } from '@nestjs/common';
import type { Database, TxClient } from '@shootline/db';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  constructor(readonly database: Database) {}

  transaction<T>(fn: (tx: TxClient) => Promise<T>): Promise<T> {
    return this.database.transaction(fn);
  }

  async onModuleDestroy(): Promise<void> {
    await this.database.close();
  }
}
