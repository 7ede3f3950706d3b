export type ResourceKind = 'track' | 'playlist' | 'album' | 'artist';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['track', 'playlist', 'album', 'artist'];

/** 22-character base62 catalog identifier, e.g. `1testTrackId000000000A` */
export type CatalogId = string;

/** A track's catalog id; the deduplication key for a whole run */
export type TrackId = CatalogId;

/** 40-character hex handle of one encrypted audio blob */
export type FileId = string;

export enum AudioFileFormat {
  OGG_VORBIS_96 = 'OGG_VORBIS_96',
  OGG_VORBIS_160 = 'OGG_VORBIS_160',
  OGG_VORBIS_320 = 'OGG_VORBIS_320',
  MP3_96 = 'MP3_96',
  MP3_160 = 'MP3_160',
  MP3_160_ENC = 'MP3_160_ENC',
  MP3_256 = 'MP3_256',
  MP3_320 = 'MP3_320',
  AAC_24 = 'AAC_24',
  AAC_48 = 'AAC_48',
  FLAC_FLAC = 'FLAC_FLAC'
}

// Highest bitrate first
export const PREFERRED_FORMATS: readonly AudioFileFormat[] = [
  AudioFileFormat.OGG_VORBIS_320,
  AudioFileFormat.OGG_VORBIS_160,
  AudioFileFormat.OGG_VORBIS_96
];

export function isAudioFileFormat(value: string): value is AudioFileFormat {
  return Object.values(AudioFileFormat).some(format => format === value);
}

export interface Reference {
  kind: ResourceKind;
  id: CatalogId;
}

export interface TrackRecord {
  id: TrackId;
  name: string;
  albumName: string;
  artists: string[];
  files: Partial<Record<AudioFileFormat, FileId>>;
  alternatives: TrackId[];
}

/** Album ids of one grouping, in returned order */
export type AlbumGroup = CatalogId[];

export interface ArtistRecord {
  id: CatalogId;
  name: string;
  albums: AlbumGroup[];
  singles: AlbumGroup[];
}

export interface PlayableTrack {
  record: TrackRecord;
  file: FileId;
  format: AudioFileFormat;
}

export type DownloadOutcome =
  | { status: 'written'; path: string }
  | { status: 'exists'; path: string }
  | { status: 'skipped'; reason: string };

export interface RunSummary {
  errored: number;
  existing: number;
  written: number;
  total: number;
}
