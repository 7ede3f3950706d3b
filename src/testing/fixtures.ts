import { createCipheriv } from 'crypto';
import { Readable } from 'stream';
import type { KeyProvider, MetadataProvider, StreamProvider } from '../models/provider.model';
import type { ArtistRecord, CatalogId, FileId, TrackId, TrackRecord } from '../models/track.model';
import { AUDIO_AES_IV } from '../services/decrypt.service';
import { Logger } from '../services/logger.service';
import { CommentHeader, PAGE_FIRST, PAGE_LAST, encodeCommentHeader, paginate, writePage } from '../utils/ogg';

export const TEST_KEY = Buffer.from('test-secret-key!', 'utf8');

export function silentLogger(): Logger {
  return new Logger({ logToConsole: false });
}

export function trackRecord(overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    id: 'trackA',
    name: 'Song',
    albumName: 'Album',
    artists: ['X', 'Y'],
    files: {},
    alternatives: [],
    ...overrides
  };
}

export interface VorbisStreamOptions {
  vendor?: string;
  tags?: Array<[string, string]>;
  audioPackets?: Buffer[];
  serial?: number;
}

/**
 * A minimal Ogg Vorbis stream: identification page, comment + setup page,
 * then one page of audio packets
 */
export function buildVorbisStream(options: VorbisStreamOptions = {}): Buffer {
  const serial = options.serial ?? 0x1234;
  const identification = Buffer.concat([Buffer.from([0x01]), Buffer.from('vorbis'), Buffer.alloc(23)]);
  const setup = Buffer.concat([Buffer.from([0x05]), Buffer.from('vorbis'), Buffer.alloc(40, 0x11)]);

  const comments = new CommentHeader();
  comments.setVendor(options.vendor ?? 'test encoder');
  for (const [key, value] of options.tags ?? [['title', 'Old title']]) {
    comments.addTag(key, value);
  }

  const firstPages = paginate([identification], serial, 0);
  firstPages[0].headerType |= PAGE_FIRST;
  const headerPages = paginate([encodeCommentHeader(comments), setup], serial, firstPages.length);
  const audioPages = paginate(
    options.audioPackets ?? [Buffer.alloc(100, 0x22), Buffer.alloc(300, 0x33)],
    serial,
    firstPages.length + headerPages.length,
    4410n
  );
  audioPages[audioPages.length - 1].headerType |= PAGE_LAST;

  return Buffer.concat([...firstPages, ...headerPages, ...audioPages].map(writePage));
}

export function encryptAudio(key: Buffer, plain: Buffer): Buffer {
  const cipher = createCipheriv('aes-128-ctr', key, AUDIO_AES_IV);
  return Buffer.concat([cipher.update(plain), cipher.final()]);
}

/**
 * In-memory catalog recording every call it receives
 */
export class FakeCatalog implements MetadataProvider, KeyProvider, StreamProvider {
  public readonly tracks = new Map<TrackId, TrackRecord>();
  public readonly playlists = new Map<CatalogId, TrackId[]>();
  public readonly albums = new Map<CatalogId, TrackId[]>();
  public readonly artists = new Map<CatalogId, ArtistRecord>();
  public readonly keys = new Map<FileId, Buffer>();
  public readonly audio = new Map<FileId, Buffer>();
  public readonly calls: string[] = [];

  public async fetchTrack(id: TrackId): Promise<TrackRecord> {
    return this.lookup(this.tracks, 'track', id);
  }

  public async fetchPlaylist(id: CatalogId): Promise<TrackId[]> {
    return this.lookup(this.playlists, 'playlist', id);
  }

  public async fetchAlbum(id: CatalogId): Promise<TrackId[]> {
    return this.lookup(this.albums, 'album', id);
  }

  public async fetchArtist(id: CatalogId): Promise<ArtistRecord> {
    return this.lookup(this.artists, 'artist', id);
  }

  public async requestKey(trackId: TrackId, file: FileId): Promise<Buffer> {
    this.calls.push(`key:${trackId}:${file}`);
    const key = this.keys.get(file);
    if (!key) throw new Error(`no key for ${file}`);
    return key;
  }

  public async open(file: FileId): Promise<Readable> {
    this.calls.push(`open:${file}`);
    const audio = this.audio.get(file);
    if (!audio) throw new Error(`no audio for ${file}`);
    return Readable.from([audio]);
  }

  private lookup<T>(entries: Map<string, T>, kind: string, id: string): T {
    this.calls.push(`${kind}:${id}`);
    const entry = entries.get(id);
    if (entry === undefined) throw new Error(`${kind} ${id} not found`);
    return entry;
  }
}
