export { filterForRole, requirementFor, SYNC_ROLES } from './environment-filter.js';
export type { SyncRole } from './environment-filter.js';
