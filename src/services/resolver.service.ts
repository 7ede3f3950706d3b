import { errorMessage } from '../models/download-error';
import { MetadataProvider } from '../models/provider.model';
import { CatalogId, Reference, TrackId } from '../models/track.model';
import { Logger } from './logger.service';

/** What to do when a collection cannot be fetched: log and move on, or throw */
export type ErrorPolicy = 'skip' | 'abort';

type CollectionKind = 'playlist' | 'album';

export type ResolveResult =
  | { status: 'resolved'; added: number }
  | { status: 'skipped'; reason: string };

/**
 * Expands track, playlist, album and artist references into a set of track ids
 */
export class TrackSetResolver {
  constructor(
    private metadata: MetadataProvider,
    private logger: Logger
  ) {}

  /**
   * Add the tracks behind one reference to `into`. A playlist, album or
   * artist that cannot be fetched is skipped and leaves `into` untouched.
   */
  public async resolve(reference: Reference, into: Set<TrackId>): Promise<ResolveResult> {
    const sizeBefore = into.size;

    switch (reference.kind) {
      case 'track':
        into.add(reference.id);
        break;

      case 'playlist':
      case 'album': {
        const result = await this.expandCollection(reference.kind, reference.id, into, 'skip');
        if (result.status === 'skipped') return result;
        break;
      }

      case 'artist': {
        let artistTracks: Set<TrackId>;
        try {
          artistTracks = await this.expandArtist(reference.id);
        } catch (error) {
          const reason = `cannot get artist metadata: ${errorMessage(error)}`;
          this.logger.debug(`Skipping artist ${reference.id}: ${reason}`);
          return { status: 'skipped', reason };
        }
        artistTracks.forEach(id => into.add(id));
        break;
      }
    }

    return { status: 'resolved', added: into.size - sizeBefore };
  }

  /**
   * Every album of an artist, "albums" groupings before "singles" groupings.
   * One album failing fails the whole artist.
   */
  public async expandArtist(id: CatalogId): Promise<Set<TrackId>> {
    const artist = await this.metadata.fetchArtist(id);
    this.logger.debug(
      `Artist ${artist.name || id}: ${artist.albums.length} album groups, ${artist.singles.length} single groups`
    );

    const tracks = new Set<TrackId>();
    for (const group of [...artist.albums, ...artist.singles]) {
      for (const albumId of group) {
        await this.expandCollection('album', albumId, tracks, 'abort');
      }
    }
    return tracks;
  }

  private async expandCollection(
    kind: CollectionKind,
    id: CatalogId,
    into: Set<TrackId>,
    policy: ErrorPolicy
  ): Promise<ResolveResult> {
    let trackIds: TrackId[];
    try {
      trackIds = kind === 'playlist'
        ? await this.metadata.fetchPlaylist(id)
        : await this.metadata.fetchAlbum(id);
    } catch (error) {
      if (policy === 'abort') throw error;

      const reason = `cannot get ${kind} metadata: ${errorMessage(error)}`;
      this.logger.debug(`Skipping ${kind} ${id}: ${reason}`);
      return { status: 'skipped', reason };
    }

    const sizeBefore = into.size;
    trackIds.forEach(trackId => into.add(trackId));
    this.logger.debug(`${kind} ${id}: ${trackIds.length} tracks`);

    return { status: 'resolved', added: into.size - sizeBefore };
  }
}
