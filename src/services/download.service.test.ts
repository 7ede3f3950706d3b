import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import DownloadError from '../models/download-error';
import { AudioFileFormat } from '../models/track.model';
import { FakeCatalog, TEST_KEY, buildVorbisStream, encryptAudio, silentLogger, trackRecord } from '../testing/fixtures';
import { vorbisCommentRewriter } from '../utils/ogg';
import { AudioDecryptor } from './decrypt.service';
import { DownloadManager, summarize } from './download.service';
import { FileService } from './file.service';
import { CONTAINER_PREAMBLE_LENGTH, DownloadPipeline } from './pipeline.service';
import { ProgressReporter, formatSummary } from './progress.service';
import { TrackFormatResolver } from './track.service';

describe('summarize', () => {
  it('counts every outcome that was neither written nor existing as an error', () => {
    expect(
      summarize([
        { status: 'written', path: '/a' },
        { status: 'exists', path: '/b' },
        { status: 'skipped', reason: 'x' },
        { status: 'skipped', reason: 'y' }
      ])
    ).toEqual({ errored: 2, existing: 1, written: 1, total: 4 });
  });

  it('is all zeroes for an empty run', () => {
    expect(summarize([])).toEqual({ errored: 0, existing: 0, written: 0, total: 0 });
  });
});

describe('formatSummary', () => {
  it('prints the four totals', () => {
    expect(formatSummary({ errored: 1, existing: 2, written: 3, total: 6 })).toEqual([
      ' -> 1 error',
      ' -> 2 already downloaded',
      ' -> 3 new',
      ' -> 6 total processed'
    ]);
  });
});

describe('DownloadManager', () => {
  let dir: string;
  let template: string;
  let catalog: FakeCatalog;
  let lines: string[];
  let manager: DownloadManager;
  let reporter: ProgressReporter;

  const playableAudio = () =>
    encryptAudio(TEST_KEY, Buffer.concat([Buffer.alloc(CONTAINER_PREAMBLE_LENGTH, 0xab), buildVorbisStream()]));

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'spotify-ogg-dl-'));
    template = `${dir}/{author}/{album}/{name}.{ext}`;
    catalog = new FakeCatalog();
    lines = [];

    const logger = silentLogger();
    const pipeline = new DownloadPipeline(logger, {
      keys: catalog,
      streams: catalog,
      decryptor: new AudioDecryptor(),
      rewriter: vorbisCommentRewriter,
      files: new FileService(logger)
    });
    manager = new DownloadManager(logger, new TrackFormatResolver(catalog, logger), pipeline);
    reporter = new ProgressReporter(manager, pipeline, line => lines.push(line));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('downloads a single playable track', async () => {
    catalog.tracks.set('one', trackRecord({ id: 'one', files: { [AudioFileFormat.OGG_VORBIS_160]: 'f160' } }));
    catalog.keys.set('f160', TEST_KEY);
    catalog.audio.set('f160', playableAudio());

    const summary = await manager.run(['one'], template);

    expect(summary).toEqual({ errored: 0, existing: 0, written: 1, total: 1 });
    expect(fs.existsSync(`${dir}/X/Album/Song.ogg`)).toBe(true);
    expect(lines).toEqual([
      ' -> Song (one)',
      '   - getting encrypted audio file',
      '   - decrypting audio',
      '   - writing output file',
      `   - wrote "${dir}/X/Album/Song.ogg"`
    ]);
  });

  it('reports the alternative that was downloaded', async () => {
    catalog.tracks.set('orig', trackRecord({ id: 'orig', alternatives: ['alt'] }));
    catalog.tracks.set('alt', trackRecord({ id: 'alt', files: { [AudioFileFormat.OGG_VORBIS_96]: 'f96' } }));
    catalog.keys.set('f96', TEST_KEY);
    catalog.audio.set('f96', playableAudio());

    await manager.run(['orig'], template);

    expect(lines[0]).toBe(' -> Song (alt alt. orig)');
    expect(catalog.calls).toContain('key:alt:f96');
  });

  it('counts existing files on a second run', async () => {
    catalog.tracks.set('one', trackRecord({ id: 'one', files: { [AudioFileFormat.OGG_VORBIS_320]: 'f320' } }));
    catalog.keys.set('f320', TEST_KEY);
    catalog.audio.set('f320', playableAudio());

    await manager.run(['one'], template);
    lines.length = 0;
    const summary = await manager.run(['one'], template);

    expect(summary).toEqual({ errored: 0, existing: 1, written: 0, total: 1 });
    expect(lines).toEqual([
      ' -> Song (one)',
      `   - note: output file "${dir}/X/Album/Song.ogg" already exists, skipping...`
    ]);
  });

  it('keeps going after tracks that fail', async () => {
    catalog.tracks.set('mp3', trackRecord({ id: 'mp3', name: 'Mp3', files: { [AudioFileFormat.MP3_320]: 'm' } }));
    catalog.tracks.set('nokey', trackRecord({ id: 'nokey', name: 'NoKey', files: { [AudioFileFormat.OGG_VORBIS_160]: 'k' } }));
    catalog.tracks.set('good', trackRecord({ id: 'good', files: { [AudioFileFormat.OGG_VORBIS_160]: 'g' } }));
    catalog.keys.set('g', TEST_KEY);
    catalog.audio.set('g', playableAudio());

    const summary = await manager.run(['missing', 'mp3', 'nokey', 'good'], template);

    expect(summary).toEqual({ errored: 3, existing: 0, written: 1, total: 4 });
    expect(lines.slice(0, 6)).toEqual([
      ' -> ?? (missing)',
      '   - warning: cannot get track from id: track missing not found, skipping...',
      ' -> ?? (mp3)',
      '   - warning: cannot get track from id: cannot find a suitable track, skipping...',
      ' -> NoKey (nokey)',
      '   - warning: cannot get audio key: no key for k, skipping...'
    ]);
  });

  it('stops the run on a fatal error', async () => {
    catalog.tracks.set('one', trackRecord({ id: 'one', files: { [AudioFileFormat.OGG_VORBIS_160]: 'f160' } }));

    const error = await manager.run(['one'], '{name}.{ext}').catch((reason: unknown) => reason);

    expect(error instanceof DownloadError && error.type).toBe('PATH_TEMPLATE');
  });

  it('prints the summary block', () => {
    reporter.summary({ errored: 0, existing: 0, written: 1, total: 1 });

    expect(lines[0]).toMatch(/^\n=> Processed tracks: \(.+\)$/);
    expect(lines.slice(1)).toEqual([' -> 0 error', ' -> 0 already downloaded', ' -> 1 new', ' -> 1 total processed']);
  });
});
