import { EventEmitter } from 'events';
import { errorMessage } from '../models/download-error';
import { DownloadOutcome, PlayableTrack, RunSummary, TrackId } from '../models/track.model';
import { Logger } from './logger.service';
import { DownloadPipeline } from './pipeline.service';
import { TrackFormatResolver } from './track.service';

export function summarize(outcomes: DownloadOutcome[]): RunSummary {
  const written = outcomes.filter(outcome => outcome.status === 'written').length;
  const existing = outcomes.filter(outcome => outcome.status === 'exists').length;

  return {
    errored: outcomes.length - written - existing,
    existing,
    written,
    total: outcomes.length
  };
}

/**
 * Processes resolved track ids one at a time.
 *
 * Emits `resolved` ({ requestedId, playable }) when a playable file was found
 * and `unresolved` (id, reason) when none was.
 */
export class DownloadManager extends EventEmitter {
  constructor(
    private logger: Logger,
    private formatResolver: TrackFormatResolver,
    private pipeline: DownloadPipeline
  ) {
    super();
  }

  /**
   * Download every track in iteration order. Fatal errors from the pipeline
   * stop the run and propagate.
   */
  public async run(trackIds: Iterable<TrackId>, template: string): Promise<RunSummary> {
    const outcomes: DownloadOutcome[] = [];

    for (const id of trackIds) {
      outcomes.push(await this.processTrack(id, template));
    }

    const summary = summarize(outcomes);
    this.logger.info(
      `Processed ${summary.total} tracks: ${summary.written} new, ${summary.existing} existing, ${summary.errored} errors`
    );
    return summary;
  }

  public async processTrack(id: TrackId, template: string): Promise<DownloadOutcome> {
    let playable: PlayableTrack;
    try {
      playable = await this.formatResolver.resolvePlayable(id);
    } catch (error) {
      const reason = errorMessage(error);
      this.emit('unresolved', id, reason);
      return { status: 'skipped', reason: `cannot get track from id: ${reason}` };
    }

    this.emit('resolved', { requestedId: id, playable });
    this.logger.debug(`Resolved ${id} to ${playable.record.id} as ${playable.format}`);

    return this.pipeline.downloadOne(id, playable.record, playable.file, template);
  }
}
