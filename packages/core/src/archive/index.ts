export {
  readPackArchive,
  loadPackArchive,
  mergeOverrideSources,
  MANIFEST_FILE_NAME,
  GENERIC_OVERRIDES_PREFIX,
  ROLE_OVERRIDES_PREFIX,
} from './pack-archive.js';
export type { PackArchive } from './pack-archive.js';
