import type { DependencyId, KnownDependencyKind } from './types.js';

const DISPLAY_NAMES: Record<KnownDependencyKind, string> = {
  minecraft: 'Minecraft',
  forge: 'Forge',
  neoforge: 'NeoForge',
  'fabric-loader': 'Fabric',
  'quilt-loader': 'Quilt',
};

function isKnownKind(tag: string): tag is KnownDependencyKind {
  return Object.prototype.hasOwnProperty.call(DISPLAY_NAMES, tag);
}

/** Map a raw manifest tag to a DependencyId. Total: unknown tags become 'other'. */
export function parseDependencyId(tag: string): DependencyId {
  if (isKnownKind(tag)) {
    return { kind: tag };
  }
  return { kind: 'other', name: tag };
}

/** Tag as written in the manifest document */
export function dependencyTag(id: DependencyId): string {
  return id.kind === 'other' ? id.name : id.kind;
}

/** Human-readable name, e.g. "Fabric" for fabric-loader */
export function formatDependencyId(id: DependencyId): string {
  return id.kind === 'other' ? id.name : DISPLAY_NAMES[id.kind];
}
