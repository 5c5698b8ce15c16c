import { SetMetadata } from '@nestjs/common';
import type { Capability } from './rbac.js';

export const IS_PUBLIC_KEY = 'isPublic';
export const REQUIRED_CAPABILITIES_KEY = 'requiredCapabilities';

export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
export const RequireCapabilities = (...capabilities: Capability[]) =>
  SetMetadata(REQUIRED_CAPABILITIES_KEY, capabilities);
