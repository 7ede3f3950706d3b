import type { Readable } from 'stream';
import type { CommentHeader } from '../utils/ogg';
import type { ArtistRecord, CatalogId, FileId, TrackId, TrackRecord } from './track.model';

export interface Credentials {
  username: string;
  password: string;
}

export interface ActiveSession {
  username: string;
  accessToken: string;
  deviceId: string;
}

export interface MetadataProvider {
  fetchTrack(id: TrackId): Promise<TrackRecord>;
  fetchPlaylist(id: CatalogId): Promise<TrackId[]>;
  fetchAlbum(id: CatalogId): Promise<TrackId[]>;
  fetchArtist(id: CatalogId): Promise<ArtistRecord>;
}

export interface KeyProvider {
  requestKey(trackId: TrackId, file: FileId): Promise<Buffer>;
}

export interface StreamProvider {
  open(file: FileId): Promise<Readable>;
}

export interface Decryptor {
  decrypt(key: Buffer, encrypted: Buffer): Buffer;
}

export interface CommentHeaderRewriter {
  splice(container: Buffer, header: CommentHeader): Buffer;
}
