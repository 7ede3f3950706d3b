import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { AppConfig } from '../config/config';
import DownloadError, { DownloadErrorType, errorMessage } from '../models/download-error';
import { ActiveSession, KeyProvider, MetadataProvider, StreamProvider } from '../models/provider.model';
import {
  AlbumGroup,
  ArtistRecord,
  AudioFileFormat,
  CatalogId,
  FileId,
  TrackId,
  TrackRecord,
  isAudioFileFormat
} from '../models/track.model';
import { RateLimiter } from '../utils/rate-limiter';
import { classify } from '../utils/reference-parser';
import { base62ToHex, hexToBase62 } from '../utils/spotify-id';
import { Logger } from './logger.service';

interface GidEntry {
  gid?: string;
  name?: string;
}

interface TrackResponse extends GidEntry {
  album?: GidEntry;
  artist?: GidEntry[];
  file?: { file_id?: string; format?: string }[];
  alternative?: GidEntry[];
}

interface AlbumResponse extends GidEntry {
  disc?: { number?: number; track?: GidEntry[] }[];
}

interface ArtistResponse extends GidEntry {
  album_group?: { album?: GidEntry[] }[];
  single_group?: { album?: GidEntry[] }[];
}

interface PlaylistResponse {
  contents?: { items?: { uri?: string }[] };
}

interface AudioKeyResponse {
  key?: string;
}

interface StorageResolveResponse {
  result?: string;
  cdnurl?: string[];
}

const AUDIO_KEY_LENGTH = 16;

/**
 * Metadata, audio key and audio file access over the catalog's JSON gateway.
 * Every request made with `http` waits on the rate limiter first.
 */
export class CatalogClient implements MetadataProvider, KeyProvider, StreamProvider {
  constructor(
    private http: AxiosInstance,
    private logger: Logger,
    private rateLimiter: RateLimiter,
    private cdn: AxiosInstance = axios.create()
  ) {}

  public static create(session: ActiveSession, config: AppConfig, logger: Logger): CatalogClient {
    const http = axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.requestTimeoutMs,
      headers: {
        Authorization: `Bearer ${session.accessToken}`,
        Accept: 'application/json'
      }
    });
    const cdn = axios.create({ timeout: config.requestTimeoutMs });

    return new CatalogClient(http, logger, RateLimiter.perMinute(config.requestsPerMinute), cdn);
  }

  public async fetchTrack(id: TrackId): Promise<TrackRecord> {
    const track = await this.get<TrackResponse>('METADATA_FETCH', `/metadata/4/track/${toHex(id)}`);

    const files: Partial<Record<AudioFileFormat, FileId>> = {};
    for (const file of track.file ?? []) {
      if (file.file_id && file.format && isAudioFileFormat(file.format) && !files[file.format]) {
        files[file.format] = file.file_id.toLowerCase();
      }
    }

    return {
      id: requireId(track, `track ${id}`),
      name: track.name ?? '',
      albumName: track.album?.name ?? '',
      artists: (track.artist ?? []).map(artist => artist.name ?? ''),
      files,
      alternatives: toIds(track.alternative)
    };
  }

  public async fetchPlaylist(id: CatalogId): Promise<TrackId[]> {
    const playlist = await this.get<PlaylistResponse>('METADATA_FETCH', `/playlist/v2/playlist/${id}`);
    const trackIds: TrackId[] = [];

    for (const item of playlist.contents?.items ?? []) {
      const reference = item.uri ? classify(item.uri) : null;
      if (reference?.kind === 'track') {
        trackIds.push(reference.id);
      } else {
        this.logger.debug(`Ignoring playlist item ${item.uri ?? '(no uri)'} in ${id}`);
      }
    }

    return trackIds;
  }

  public async fetchAlbum(id: CatalogId): Promise<TrackId[]> {
    const album = await this.get<AlbumResponse>('METADATA_FETCH', `/metadata/4/album/${toHex(id)}`);
    return (album.disc ?? []).flatMap(disc => toIds(disc.track));
  }

  public async fetchArtist(id: CatalogId): Promise<ArtistRecord> {
    const artist = await this.get<ArtistResponse>('METADATA_FETCH', `/metadata/4/artist/${toHex(id)}`);
    const groups = (entries?: { album?: GidEntry[] }[]): AlbumGroup[] =>
      (entries ?? []).map(group => toIds(group.album));

    return {
      id: requireId(artist, `artist ${id}`),
      name: artist.name ?? '',
      albums: groups(artist.album_group),
      singles: groups(artist.single_group)
    };
  }

  public async requestKey(trackId: TrackId, file: FileId): Promise<Buffer> {
    const response = await this.get<AudioKeyResponse>('KEY', `/audio-key/v1/${toHex(trackId)}/${file}`);
    const key = Buffer.from(response.key ?? '', 'hex');

    if (key.length !== AUDIO_KEY_LENGTH) {
      throw new DownloadError('KEY', `audio key for ${file} has ${key.length} bytes`);
    }
    return key;
  }

  public async open(file: FileId): Promise<Readable> {
    const storage = await this.get<StorageResolveResponse>(
      'STREAM',
      `/storage-resolve/files/audio/interactive/${file}?alt=json`
    );
    const url = storage.cdnurl?.[0];

    if (storage.result !== 'CDN' || !url) {
      throw new DownloadError('STREAM', `no CDN url for file ${file} (result: ${storage.result ?? 'none'})`);
    }

    this.logger.debug(`Streaming ${file} from ${new URL(url).host}`);
    try {
      const response = await this.cdn.get<Readable>(url, { responseType: 'stream' });
      return response.data;
    } catch (error) {
      throw new DownloadError('STREAM', errorMessage(error), { cause: error });
    }
  }

  private async get<T>(type: DownloadErrorType, url: string): Promise<T> {
    return this.rateLimiter.schedule(async () => {
      this.logger.debug(`GET ${url}`);
      try {
        const response = await this.http.get<T>(url);
        return response.data;
      } catch (error) {
        throw new DownloadError(type, errorMessage(error), { cause: error });
      }
    });
  }
}

function toHex(id: CatalogId): string {
  const hex = base62ToHex(id);
  if (hex === null) {
    throw new DownloadError('PARSE', `invalid catalog id ${id}`);
  }
  return hex;
}

function requireId(entry: GidEntry, what: string): CatalogId {
  if (!entry.gid) {
    throw new DownloadError('METADATA_FETCH', `no gid in ${what} metadata`);
  }
  return hexToBase62(entry.gid);
}

function toIds(entries?: GidEntry[]): CatalogId[] {
  return (entries ?? []).flatMap(entry => (entry.gid ? [hexToBase62(entry.gid)] : []));
}
