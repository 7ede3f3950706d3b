import { EventEmitter } from 'events';
import DownloadError, { DownloadErrorType, errorMessage } from '../models/download-error';
import { CommentHeaderRewriter, Decryptor, KeyProvider, StreamProvider } from '../models/provider.model';
import { DownloadOutcome, FileId, TrackId, TrackRecord } from '../models/track.model';
import { CommentHeader } from '../utils/ogg';
import { buildOutputPath, outputDirectory } from '../utils/output-path';
import { FileService } from './file.service';
import { Logger } from './logger.service';

// Decrypted files start with a fixed-size block ahead of the Ogg stream
export const CONTAINER_PREAMBLE_LENGTH = 0xa7;
export const COMMENT_VENDOR = 'Ogg';

export interface PipelineCollaborators {
  keys: KeyProvider;
  streams: StreamProvider;
  decryptor: Decryptor;
  rewriter: CommentHeaderRewriter;
  files: FileService;
}

export function buildCommentHeader(record: TrackRecord): CommentHeader {
  const header = new CommentHeader();
  header.setVendor(COMMENT_VENDOR);
  header.addTag('title', record.name);
  header.addTag('album', record.albumName);
  record.artists.forEach(artist => header.addTag('artist', artist));
  return header;
}

/**
 * Downloads, decrypts, tags and stores a single track.
 *
 * Emits:
 * - `progress` (message) before each long step
 * - `exists` (path) when the output file is already there
 * - `written` (path) once the file is stored
 * - `skip` (reason) when a step failed and the track was given up
 */
export class DownloadPipeline extends EventEmitter {
  constructor(
    private logger: Logger,
    private collaborators: PipelineCollaborators
  ) {
    super();
  }

  /**
   * Per-track failures become a `skipped` outcome. A template without a
   * directory separator, or a directory that cannot be created, throws.
   */
  public async downloadOne(
    originalId: TrackId,
    record: TrackRecord,
    file: FileId,
    template: string
  ): Promise<DownloadOutcome> {
    const { files } = this.collaborators;
    const outputPath = buildOutputPath(template, record);

    if (await files.exists(outputPath)) {
      this.emit('exists', outputPath);
      return { status: 'exists', path: outputPath };
    }

    await files.ensureDirectory(outputDirectory(outputPath));

    try {
      const data = await this.fetchTagged(record, file);
      this.emit('progress', 'writing output file');
      await files.writeFile(outputPath, data);
    } catch (error) {
      if (error instanceof DownloadError && error.isFatal) throw error;

      const reason = errorMessage(error);
      this.logger.debug(`Skipping ${originalId} (${record.id}): ${reason}`);
      this.emit('skip', reason);
      return { status: 'skipped', reason };
    }

    this.emit('written', outputPath);
    return { status: 'written', path: outputPath };
  }

  private async fetchTagged(record: TrackRecord, file: FileId): Promise<Buffer> {
    const { keys, streams, decryptor, rewriter, files } = this.collaborators;

    const key = await this.step('KEY', 'cannot get audio key', () => keys.requestKey(record.id, file));

    this.emit('progress', 'getting encrypted audio file');
    const stream = await this.step('STREAM', 'cannot get audio file', () => streams.open(file));
    const encrypted = await this.step('STREAM', 'cannot get track file audio', () => files.readAll(stream));

    this.emit('progress', 'decrypting audio');
    const decrypted = await this.step('DECRYPT', 'cannot decrypt audio file', async () =>
      decryptor.decrypt(key, encrypted)
    );

    const container = decrypted.subarray(CONTAINER_PREAMBLE_LENGTH);
    return this.step('CONTAINER', 'cannot rewrite comment header', async () =>
      rewriter.splice(container, buildCommentHeader(record))
    );
  }

  private async step<T>(type: DownloadErrorType, action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new DownloadError(type, `${action}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
