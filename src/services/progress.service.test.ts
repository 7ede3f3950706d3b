import { beforeEach, describe, expect, it } from 'vitest';
import { FakeCatalog, silentLogger } from '../testing/fixtures';
import { vorbisCommentRewriter } from '../utils/ogg';
import { AudioDecryptor } from './decrypt.service';
import { DownloadManager } from './download.service';
import { FileService } from './file.service';
import { DownloadPipeline } from './pipeline.service';
import { ProgressReporter } from './progress.service';
import { TrackFormatResolver } from './track.service';

describe('ProgressReporter', () => {
  let lines: string[];
  let reporter: ProgressReporter;
  let pipeline: DownloadPipeline;

  beforeEach(() => {
    const logger = silentLogger();
    const catalog = new FakeCatalog();
    pipeline = new DownloadPipeline(logger, {
      keys: catalog,
      streams: catalog,
      decryptor: new AudioDecryptor(),
      rewriter: vorbisCommentRewriter,
      files: new FileService(logger)
    });
    const manager = new DownloadManager(logger, new TrackFormatResolver(catalog, logger), pipeline);
    lines = [];
    reporter = new ProgressReporter(manager, pipeline, line => lines.push(line));
  });

  it('prints the input section', () => {
    reporter.loggedIn('user');
    reporter.inputHeader();
    reporter.reference({ kind: 'album', id: 'abc', matched: 'abc' });
    reporter.referenceSkipped('cannot get album metadata: album abc not found');
    reporter.unrecognized('spotify:show:abc');
    reporter.parsed(3);

    expect(lines).toEqual([
      '=> Logged in as: user',
      '\n=> Input resources:',
      ' -> album: abc',
      '   - warning: cannot get album metadata: album abc not found, skipping...',
      ' -> warning: unrecognized input: spotify:show:abc, skipping...',
      '\n=> Parsed 3 tracks:'
    ]);
  });

  it('prints pipeline events under the current track', () => {
    pipeline.emit('progress', 'decrypting audio');
    pipeline.emit('skip', 'cannot decrypt audio file: bad key');

    expect(lines).toEqual(['   - decrypting audio', '   - warning: cannot decrypt audio file: bad key, skipping...']);
  });

  it('keeps the same text when colored', () => {
    const colored: string[] = [];
    const logger = silentLogger();
    const catalog = new FakeCatalog();
    const manager = new DownloadManager(logger, new TrackFormatResolver(catalog, logger), pipeline);
    const coloredReporter = new ProgressReporter(manager, pipeline, line => colored.push(line), { colored: true });

    coloredReporter.unrecognized('spotify:show:abc');

    const stripAnsi = (line: string) => line.replace(/\u001b\[[0-9;]*m/g, '');
    expect(colored.map(stripAnsi)).toEqual([' -> warning: unrecognized input: spotify:show:abc, skipping...']);
  });
});
