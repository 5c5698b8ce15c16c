import { Inject, Injectable } from '@nestjs/common';
import type { JwtClaims } from '@shootline/auth';
import type { Logger } from '@shootline/common';
import type { ClientCreate, ClientUpdate } from '@shootline/contracts';
import type { ClientPatch, ClientRow, TxClient } from '@shootline/db';
import { constraintViolation, notFound } from '../common/errors.js';
import { serializeClient } from '../common/serializers.js';

@Injectable()
export class ClientsService {
  constructor(@Inject('APP_LOGGER') private readonly logger: Logger) {}

  async listClients(tx: TxClient) {
    const clients = await tx.listClients();
    return clients.map((client) => serializeClient(client));
  }

  async getClient(tx: TxClient, clientId: string) {
    return serializeClient(await this.getClientOrThrow(tx, clientId));
  }

  async createClient(tx: TxClient, input: ClientCreate) {
    const client = await tx.insertClient({
      name: input.name,
      industry: input.industry ?? null,
      email: input.email ?? null,
      phone: input.phone ?? null
    });
    return serializeClient(client);
  }

  async updateClient(tx: TxClient, clientId: string, input: ClientUpdate) {
    await this.getClientOrThrow(tx, clientId);
    const patch: ClientPatch = {
      ...(input.name !== undefined ? { name: input.name } : {}),
      ...(input.industry !== undefined ? { industry: input.industry } : {}),
      ...(input.email !== undefined ? { email: input.email } : {}),
      ...(input.phone !== undefined ? { phone: input.phone } : {})
    };

    const updated = await tx.updateClient(clientId, patch);
    if (!updated) {
      throw notFound('client', clientId);
    }
    return serializeClient(updated);
  }

  async deleteClient(tx: TxClient, claims: JwtClaims, clientId: string) {
    await this.getClientOrThrow(tx, clientId);

    const [dealCount, jobCount] = await Promise.all([
      tx.countDeals({ clientId }),
      tx.countJobs({ clientId })
    ]);
    if (dealCount > 0 || jobCount > 0) {
      throw constraintViolation(
        `client ${clientId} is referenced by ${dealCount} deal(s) and ${jobCount} job(s)`,
        'client_id'
      );
    }

    await tx.deleteClient(clientId);
    this.logger.info('client_deleted', { client_id: clientId, actor_user_id: claims.user_id });
    return { id: clientId, deleted: true as const };
  }

  async getClientOrThrow(tx: TxClient, clientId: string): Promise<ClientRow> {
    const client = await tx.findClientById(clientId);
    if (!client) {
      throw notFound('client', clientId);
    }
    return client;
  }
}
