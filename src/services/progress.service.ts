import { color } from 'console-log-colors';
import type { PlayableTrack, RunSummary, TrackId } from '../models/track.model';
import { formatTime, formatTrackIds } from '../utils/formatter';
import type { ClassifiedReference } from '../utils/reference-parser';
import type { DownloadManager } from './download.service';
import type { DownloadPipeline } from './pipeline.service';

export type LineWriter = (line: string) => void;

export interface ReporterOptions {
  colored?: boolean;
}

export interface Palette {
  section(text: string): string;
  item(text: string): string;
  warning(text: string): string;
  error(text: string): string;
}

const PLAIN: Palette = {
  section: text => text,
  item: text => text,
  warning: text => text,
  error: text => text
};

const COLORED: Palette = {
  section: text => color.green.bold(text),
  item: text => color.white.bold(text),
  warning: text => color.yellow.bold(text),
  error: text => color.red.bold(text)
};

/**
 * Console lines for a run: inputs, one block per track, and the final tally
 */
export class ProgressReporter {
  private readonly startTime = Date.now();
  private readonly palette: Palette;

  constructor(
    downloadManager: DownloadManager,
    pipeline: DownloadPipeline,
    private write: LineWriter = line => process.stdout.write(`${line}\n`),
    options: ReporterOptions = {}
  ) {
    this.palette = options.colored ? COLORED : PLAIN;

    downloadManager.on('resolved', this.handleResolved.bind(this));
    downloadManager.on('unresolved', this.handleUnresolved.bind(this));
    pipeline.on('progress', this.handleProgress.bind(this));
    pipeline.on('exists', this.handleExists.bind(this));
    pipeline.on('written', this.handleWritten.bind(this));
    pipeline.on('skip', this.handleSkip.bind(this));
  }

  public loggedIn(username: string): void {
    this.write(`${this.palette.section('=>')} Logged in as: ${username}`);
  }

  public inputHeader(): void {
    this.write(`\n${this.palette.section('=>')} Input resources:`);
  }

  public reference(reference: ClassifiedReference): void {
    this.write(` ${this.palette.item('->')} ${reference.kind}: ${reference.matched}`);
  }

  public referenceSkipped(reason: string): void {
    this.write(`   - ${this.palette.warning('warning')}: ${reason}, skipping...`);
  }

  public unrecognized(line: string): void {
    this.write(` ${this.palette.item('->')} ${this.palette.warning('warning')}: unrecognized input: ${line}, skipping...`);
  }

  public parsed(count: number): void {
    this.write(`\n${this.palette.section('=>')} Parsed ${count} tracks:`);
  }

  public summary(summary: RunSummary): void {
    this.write(`\n${this.palette.section('=>')} Processed tracks: (${formatTime(Date.now() - this.startTime)})`);
    for (const line of formatSummary(summary, this.palette)) {
      this.write(line);
    }
  }

  private handleResolved({ requestedId, playable }: { requestedId: TrackId; playable: PlayableTrack }): void {
    const { record } = playable;
    this.write(` ${this.palette.item('->')} ${record.name} (${formatTrackIds(record.id, requestedId)})`);
  }

  private handleUnresolved(id: TrackId, reason: string): void {
    this.write(` ${this.palette.item('->')} ?? (${id})`);
    this.write(`   - ${this.palette.warning('warning')}: cannot get track from id: ${reason}, skipping...`);
  }

  private handleProgress(message: string): void {
    this.write(`   - ${message}`);
  }

  private handleExists(path: string): void {
    this.write(`   - note: output file "${path}" already exists, skipping...`);
  }

  private handleWritten(path: string): void {
    this.write(`   - wrote "${path}"`);
  }

  private handleSkip(reason: string): void {
    this.write(`   - ${this.palette.warning('warning')}: ${reason}, skipping...`);
  }
}

export function formatSummary(summary: RunSummary, palette: Palette = PLAIN): string[] {
  const item = palette.item('->');
  return [
    ` ${item} ${summary.errored} ${palette.error('error')}`,
    ` ${item} ${summary.existing} already downloaded`,
    ` ${item} ${summary.written} new`,
    ` ${item} ${summary.total} total processed`
  ];
}
