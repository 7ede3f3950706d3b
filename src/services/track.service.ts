import DownloadError, { errorMessage } from '../models/download-error';
import { MetadataProvider } from '../models/provider.model';
import { PREFERRED_FORMATS, PlayableTrack, TrackId, TrackRecord } from '../models/track.model';
import { Logger } from './logger.service';

/**
 * Finds a playable Vorbis file for a track, falling back on its alternatives
 */
export class TrackFormatResolver {
  constructor(
    private metadata: MetadataProvider,
    private logger: Logger
  ) {}

  /**
   * Breadth-first search from `id` through the alternatives graph. The first
   * record carrying a preferred format wins; ids already visited are skipped
   * so cyclic alternatives terminate. A failed fetch fails the whole search.
   */
  public async resolvePlayable(id: TrackId): Promise<PlayableTrack> {
    const queue: TrackId[] = [id];
    const visited = new Set<TrackId>();

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (visited.has(next)) continue;
      visited.add(next);

      let record: TrackRecord;
      try {
        record = await this.metadata.fetchTrack(next);
      } catch (error) {
        throw error instanceof DownloadError
          ? error
          : new DownloadError('METADATA_FETCH', errorMessage(error), { cause: error });
      }

      const playable = this.pickFile(record);
      if (playable) {
        if (next !== id) {
          this.logger.debug(`Using alternative ${next} for ${id}`);
        }
        return playable;
      }

      this.logger.debug(`No Vorbis file for ${next}, ${record.alternatives.length} alternatives queued`);
      queue.push(...record.alternatives);
    }

    throw new DownloadError('NO_SUITABLE_ENCODING', 'cannot find a suitable track');
  }

  private pickFile(record: TrackRecord): PlayableTrack | null {
    for (const format of PREFERRED_FORMATS) {
      const file = record.files[format];
      if (file) {
        return { record, file, format };
      }
    }
    return null;
  }
}
