import type { CommentHeaderRewriter } from '../models/provider.model';

const CAPTURE_PATTERN = Buffer.from('OggS', 'ascii');
const VORBIS_MAGIC = Buffer.from('vorbis', 'ascii');
const PAGE_HEADER_SIZE = 27;
const MAX_SEGMENTS = 255;
const MAX_LACING_VALUE = 255;

export const PAGE_CONTINUED = 0x01;
export const PAGE_FIRST = 0x02;
export const PAGE_LAST = 0x04;

export const VORBIS_IDENTIFICATION = 0x01;
export const VORBIS_COMMENT = 0x03;
export const VORBIS_SETUP = 0x05;

export interface OggPage {
  headerType: number;
  granulePosition: bigint;
  serial: number;
  sequence: number;
  segments: number[];
  body: Buffer;
}

export interface OggPacket {
  data: Buffer;
  serial: number;
  /** Index of the page the packet ends on */
  pageIndex: number;
  endsPage: boolean;
}

export interface ParseOptions {
  verifyChecksum?: boolean;
}

const CRC_TABLE = buildCrcTable();

function buildCrcTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let r = i << 24;
    for (let bit = 0; bit < 8; bit++) {
      r = r & 0x80000000 ? (r << 1) ^ 0x04c11db7 : r << 1;
    }
    table[i] = r >>> 0;
  }
  return table;
}

/**
 * Ogg page checksum: CRC-32, polynomial 0x04c11db7, zero init, no reflection
 */
export function oggCrc(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) ^ CRC_TABLE[((crc >>> 24) & 0xff) ^ byte]) >>> 0;
  }
  return crc;
}

export function parsePages(data: Buffer, options: ParseOptions = {}): OggPage[] {
  const pages: OggPage[] = [];
  let offset = 0;

  while (offset < data.length) {
    if (data.length - offset < PAGE_HEADER_SIZE) {
      throw new Error(`Truncated Ogg page header at offset ${offset}`);
    }
    if (!data.subarray(offset, offset + 4).equals(CAPTURE_PATTERN)) {
      throw new Error(`Missing Ogg capture pattern at offset ${offset}`);
    }
    const version = data.readUInt8(offset + 4);
    if (version !== 0) {
      throw new Error(`Unsupported Ogg version ${version} at offset ${offset}`);
    }

    const segmentCount = data.readUInt8(offset + 26);
    const tableEnd = offset + PAGE_HEADER_SIZE + segmentCount;
    if (tableEnd > data.length) {
      throw new Error(`Truncated Ogg segment table at offset ${offset}`);
    }

    const segments = Array.from(data.subarray(offset + PAGE_HEADER_SIZE, tableEnd));
    const pageEnd = tableEnd + segments.reduce((sum, value) => sum + value, 0);
    if (pageEnd > data.length) {
      throw new Error(`Truncated Ogg page body at offset ${offset}`);
    }

    const page: OggPage = {
      headerType: data.readUInt8(offset + 5),
      granulePosition: data.readBigInt64LE(offset + 6),
      serial: data.readUInt32LE(offset + 14),
      sequence: data.readUInt32LE(offset + 18),
      segments,
      body: data.subarray(tableEnd, pageEnd)
    };

    if (options.verifyChecksum) {
      const expected = data.readUInt32LE(offset + 22);
      const actual = writePage(page).readUInt32LE(22);
      if (expected !== actual) {
        throw new Error(`Ogg checksum mismatch on page ${page.sequence}`);
      }
    }

    pages.push(page);
    offset = pageEnd;
  }

  return pages;
}

export function writePage(page: OggPage): Buffer {
  if (page.segments.length > MAX_SEGMENTS) {
    throw new Error(`Ogg page ${page.sequence} has ${page.segments.length} segments`);
  }

  const header = Buffer.alloc(PAGE_HEADER_SIZE + page.segments.length);
  CAPTURE_PATTERN.copy(header, 0);
  header.writeUInt8(0, 4);
  header.writeUInt8(page.headerType, 5);
  header.writeBigInt64LE(page.granulePosition, 6);
  header.writeUInt32LE(page.serial, 14);
  header.writeUInt32LE(page.sequence, 18);
  header.writeUInt32LE(0, 22);
  header.writeUInt8(page.segments.length, 26);
  Buffer.from(page.segments).copy(header, PAGE_HEADER_SIZE);

  const bytes = Buffer.concat([header, page.body]);
  bytes.writeUInt32LE(oggCrc(bytes), 22);
  return bytes;
}

/**
 * Reassemble complete packets from pages, per logical stream.
 * A packet still open after the last page is dropped.
 */
export function readPackets(pages: OggPage[]): OggPacket[] {
  const packets: OggPacket[] = [];
  const pending = new Map<number, Buffer[]>();

  pages.forEach((page, pageIndex) => {
    let offset = 0;
    page.segments.forEach((value, segmentIndex) => {
      const chunks = pending.get(page.serial) ?? [];
      chunks.push(page.body.subarray(offset, offset + value));
      offset += value;

      if (value < MAX_LACING_VALUE) {
        packets.push({
          data: Buffer.concat(chunks),
          serial: page.serial,
          pageIndex,
          endsPage: segmentIndex === page.segments.length - 1
        });
        pending.delete(page.serial);
      } else {
        pending.set(page.serial, chunks);
      }
    });
  });

  return packets;
}

export function lacingValues(length: number): number[] {
  const values = new Array<number>(Math.floor(length / MAX_LACING_VALUE)).fill(MAX_LACING_VALUE);
  values.push(length % MAX_LACING_VALUE);
  return values;
}

/**
 * Lay packets out on consecutive pages. The last page is flushed, so the
 * next packet written after these pages starts on a fresh page.
 */
export function paginate(
  packets: Buffer[],
  serial: number,
  firstSequence: number,
  granulePosition: bigint = 0n
): OggPage[] {
  const pages: OggPage[] = [];
  let segments: number[] = [];
  let chunks: Buffer[] = [];
  let continued = false;

  const flush = (nextContinued: boolean) => {
    pages.push({
      headerType: continued ? PAGE_CONTINUED : 0,
      // -1 marks a page on which no packet ends
      granulePosition: segments.some(value => value < MAX_LACING_VALUE) ? granulePosition : -1n,
      serial,
      sequence: firstSequence + pages.length,
      segments,
      body: Buffer.concat(chunks)
    });
    segments = [];
    chunks = [];
    continued = nextContinued;
  };

  for (const packet of packets) {
    let offset = 0;
    lacingValues(packet.length).forEach((value, index) => {
      if (segments.length === MAX_SEGMENTS) {
        flush(index > 0);
      }
      segments.push(value);
      chunks.push(packet.subarray(offset, offset + value));
      offset += value;
    });
  }

  if (segments.length > 0) {
    flush(false);
  }

  return pages;
}

export class CommentHeader {
  private vendor = '';
  private readonly comments: Array<[string, string]> = [];

  public getVendor(): string {
    return this.vendor;
  }

  public setVendor(vendor: string): void {
    this.vendor = vendor;
  }

  /**
   * Append one tag. Repeating a key gives a multi-valued tag.
   */
  public addTag(key: string, value: string): void {
    this.comments.push([key, value]);
  }

  /**
   * All values of a tag in insertion order; keys compare case-insensitively
   */
  public getAll(key: string): string[] {
    const wanted = key.toLowerCase();
    return this.comments
      .filter(([name]) => name.toLowerCase() === wanted)
      .map(([, value]) => value);
  }

  public entries(): ReadonlyArray<readonly [string, string]> {
    return this.comments;
  }
}

function uint32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value, 0);
  return buffer;
}

export function encodeCommentHeader(header: CommentHeader): Buffer {
  const vendor = Buffer.from(header.getVendor(), 'utf8');
  const parts: Buffer[] = [
    Buffer.from([VORBIS_COMMENT]),
    VORBIS_MAGIC,
    uint32(vendor.length),
    vendor,
    uint32(header.entries().length)
  ];

  for (const [key, value] of header.entries()) {
    const comment = Buffer.from(`${key}=${value}`, 'utf8');
    parts.push(uint32(comment.length), comment);
  }

  parts.push(Buffer.from([0x01]));
  return Buffer.concat(parts);
}

export function decodeCommentHeader(packet: Buffer): CommentHeader {
  if (!isVorbisHeader(packet, VORBIS_COMMENT)) {
    throw new Error('Not a Vorbis comment header');
  }

  let offset = 1 + VORBIS_MAGIC.length;
  const readString = (): string => {
    const length = packet.readUInt32LE(offset);
    const end = offset + 4 + length;
    if (end > packet.length) {
      throw new Error('Truncated Vorbis comment header');
    }
    const value = packet.toString('utf8', offset + 4, end);
    offset = end;
    return value;
  };

  const header = new CommentHeader();
  header.setVendor(readString());

  const count = packet.readUInt32LE(offset);
  offset += 4;
  for (let i = 0; i < count; i++) {
    const comment = readString();
    const separator = comment.indexOf('=');
    if (separator === -1) {
      header.addTag(comment, '');
    } else {
      header.addTag(comment.slice(0, separator), comment.slice(separator + 1));
    }
  }

  return header;
}

function isVorbisHeader(packet: Buffer, type: number): boolean {
  return packet.length > VORBIS_MAGIC.length
    && packet.readUInt8(0) === type
    && packet.subarray(1, 1 + VORBIS_MAGIC.length).equals(VORBIS_MAGIC);
}

function vorbisHeaders(pages: OggPage[]): [OggPacket, OggPacket, OggPacket] {
  if (pages.length === 0) {
    throw new Error('Empty Ogg stream');
  }

  const serial = pages[0].serial;
  const [identification, comment, setup] = readPackets(pages).filter(packet => packet.serial === serial);

  if (!identification || !isVorbisHeader(identification.data, VORBIS_IDENTIFICATION)) {
    throw new Error('Missing Vorbis identification header');
  }
  if (!comment || !isVorbisHeader(comment.data, VORBIS_COMMENT)) {
    throw new Error('Missing Vorbis comment header');
  }
  if (!setup || !isVorbisHeader(setup.data, VORBIS_SETUP)) {
    throw new Error('Missing Vorbis setup header');
  }

  return [identification, comment, setup];
}

export function readCommentHeader(container: Buffer, options: ParseOptions = {}): CommentHeader {
  const [, comment] = vorbisHeaders(parsePages(container, options));
  return decodeCommentHeader(comment.data);
}

/**
 * Replace the comment header of an Ogg Vorbis stream. The identification
 * header keeps page 0 to itself, the new comment header and the setup header
 * are re-paged after it, and every later page of the stream is renumbered
 * in order.
 */
export function spliceCommentHeader(container: Buffer, header: CommentHeader): Buffer {
  const pages = parsePages(container);
  const [identification, , setup] = vorbisHeaders(pages);
  const serial = identification.serial;

  if (!setup.endsPage) {
    throw new Error('Vorbis setup header does not end its page');
  }

  const headerPageCount = setup.pageIndex + 1;
  if (pages.slice(0, headerPageCount).some(page => page.serial !== serial)) {
    throw new Error('Interleaved Ogg streams are not supported');
  }

  const firstPages = paginate([identification.data], serial, 0);
  firstPages[0].headerType |= PAGE_FIRST;

  const headerPages = [
    ...firstPages,
    ...paginate([encodeCommentHeader(header), setup.data], serial, firstPages.length)
  ];

  // Sequence numbers restart at 0 whatever the input started from
  let sequence = headerPages.length;
  const audioPages = pages.slice(headerPageCount).map(page =>
    page.serial === serial ? { ...page, sequence: sequence++ } : page
  );

  return Buffer.concat([...headerPages, ...audioPages].map(writePage));
}

export const vorbisCommentRewriter: CommentHeaderRewriter = {
  splice: spliceCommentHeader
};
