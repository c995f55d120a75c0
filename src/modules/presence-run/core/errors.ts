import type { AdminHierarchyConfigError } from '@/modules/admin-hierarchy/index.js';
import type { CodeListConfigError } from '@/modules/code-lists/index.js';
import type { OrganizationConfigError } from '@/modules/organizations/index.js';

/**
 * Configuration problems that abort a run before any row is processed.
 */
export type PresenceConfigError =
  | AdminHierarchyConfigError
  | OrganizationConfigError
  | CodeListConfigError;
