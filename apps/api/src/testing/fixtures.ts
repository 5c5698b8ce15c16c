import { vi } from 'vitest';
import type { JwtClaims } from '@shootline/auth';
import { resolveVocabulary, type Logger } from '@shootline/common';
import { MemoryDatabase, type ClientRow, type TxClient, type UserRow } from '@shootline/db';
import { expandCapabilitiesFromRoles } from '../auth/rbac.js';
import type { WorkflowConfig } from '../common/workflow-config.js';
import { DatabaseService } from '../db/database.service.js';
import { RequestContextService } from '../db/request-context.service.js';
import type { ViewContext } from '../types.js';

export const createLoggerStub = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
}) satisfies Logger;

export const workflowConfig = (overrides: Partial<WorkflowConfig> = {}): WorkflowConfig => ({
  vocabulary: resolveVocabulary('task'),
  jobSeedTasks: [],
  profitSharePolicy: 'permissive',
  ...overrides
});

export const claimsFor = (user: UserRow): JwtClaims => ({
  sub: user.id,
  user_id: user.id,
  username: user.username,
  role: user.role,
  capabilities: expandCapabilitiesFromRoles([user.role])
});

export interface Studio {
  database: MemoryDatabase;
  requestContext: RequestContextService;
  admin: UserRow;
  contributor: UserRow;
  client: ClientRow;
  adminClaims: JwtClaims;
  contributorClaims: JwtClaims;
  /** Runs `fn` in one transaction with a view built for `claims`. */
  run: <T>(claims: JwtClaims, fn: (tx: TxClient, view: ViewContext) => Promise<T>) => Promise<T>;
}

const insertUser = async (tx: TxClient, username: string, role: UserRow['role'], fullName: string) => {
  const user = await tx.insertUser({
    username,
    passwordHash: 'not-a-bcrypt-hash',
    role,
    fullName,
    email: `${username}@studio.test`
  });
  if (!user) {
    throw new Error(`fixture user ${username} already exists`);
  }
  return user;
};

/** An in-memory studio with one admin, one contributor and one client. */
export const createStudio = async (): Promise<Studio> => {
  const database = new MemoryDatabase();
  const requestContext = new RequestContextService(new DatabaseService(database));

  const { admin, contributor, client } = await database.transaction(async (tx) => ({
    admin: await insertUser(tx, 'admin', 'admin', 'Studio Admin'),
    contributor: await insertUser(tx, 'alex', 'contributor', 'Alex Rivera'),
    client: await tx.insertClient({ name: 'Harbor Coffee', industry: 'Hospitality' })
  }));

  return {
    database,
    requestContext,
    admin,
    contributor,
    client,
    adminClaims: claimsFor(admin),
    contributorClaims: claimsFor(contributor),
    run: (claims, fn) => requestContext.runWithView(claims, fn)
  };
};
