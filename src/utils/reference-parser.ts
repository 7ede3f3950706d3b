import { CatalogId, RESOURCE_KINDS, Reference, ResourceKind } from '../models/track.model';
import { isCatalogId } from './spotify-id';

export interface ClassifiedReference extends Reference {
  /** The id exactly as it appeared in the input line */
  matched: string;
}

function patternsFor(kind: ResourceKind): RegExp[] {
  return [
    new RegExp(`^spotify:${kind}:([A-Za-z0-9]{22})$`),
    new RegExp(`^(?:https?://)?open\\.spotify\\.com/${kind}/([A-Za-z0-9]{22})$`)
  ];
}

const PATTERNS = new Map<ResourceKind, RegExp[]>(
  RESOURCE_KINDS.map(kind => [kind, patternsFor(kind)])
);

/**
 * Classify an input line as a track, playlist, album or artist reference.
 * Accepts `spotify:<kind>:<id>` and `https://open.spotify.com/<kind>/<id>`.
 * Returns null for anything else.
 */
export function classify(line: string): ClassifiedReference | null {
  for (const kind of RESOURCE_KINDS) {
    const match = matchKind(line, kind);
    if (match) {
      return { kind, id: match, matched: match };
    }
  }
  return null;
}

function matchKind(line: string, kind: ResourceKind): CatalogId | null {
  for (const pattern of PATTERNS.get(kind) ?? []) {
    const id = pattern.exec(line)?.[1];
    if (id !== undefined && isCatalogId(id)) {
      return id;
    }
  }
  return null;
}
