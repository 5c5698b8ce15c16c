import type { Role } from '@shootline/auth';

export const Capabilities = {
  clientsRead: 'clients.read',
  clientsWrite: 'clients.write',
  dealsRead: 'deals.read',
  dealsWrite: 'deals.write',
  sharesRead: 'shares.read',
  sharesWrite: 'shares.write',
  jobsRead: 'jobs.read',
  jobsWrite: 'jobs.write',
  tasksWrite: 'tasks.write',
  tasksStatus: 'tasks.status',
  reportsRead: 'reports.read',
  usersRead: 'users.read',
  usersWrite: 'users.write'
} as const;

export type Capability = (typeof Capabilities)[keyof typeof Capabilities];

export const RoleCapabilities: Record<Role, Capability[]> = {
  admin: Object.values(Capabilities),
  // Contributors read the pipeline and move their own tasks along.
  contributor: [
    Capabilities.clientsRead,
    Capabilities.dealsRead,
    Capabilities.jobsRead,
    Capabilities.tasksStatus,
    Capabilities.reportsRead,
    Capabilities.usersRead
  ]
};

export const expandCapabilitiesFromRoles = (roles: Role[]): Capability[] => {
  const expanded = new Set<Capability>();
  for (const role of roles) {
    for (const capability of RoleCapabilities[role]) {
      expanded.add(capability);
    }
  }
  return [...expanded];
};

export const hasCapability = (capabilities: readonly string[], capability: Capability): boolean =>
  capabilities.includes(capability);
