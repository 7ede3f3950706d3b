import DownloadError from '../models/download-error';
import { TrackRecord } from '../models/track.model';

export const DEFAULT_OUTPUT_TEMPLATE = '{author}/{album}/{name}.{ext}';
export const OUTPUT_EXTENSION = 'ogg';

const UNKNOWN_ARTIST = 'Unknown Artist';

/**
 * Substitute {author}, {album}, {name} and {ext} in a template.
 * Only the first artist is used for {author}; the file tags still carry all of them.
 */
export function buildOutputPath(template: string, record: TrackRecord): string {
  const outputPath = template
    .replaceAll('{author}', () => record.artists[0] ?? UNKNOWN_ARTIST)
    .replaceAll('{album}', () => record.albumName)
    .replaceAll('{name}', () => record.name.replaceAll('/', ' '))
    .replaceAll('{ext}', OUTPUT_EXTENSION);

  if (!outputPath.includes('/')) {
    throw new DownloadError('PATH_TEMPLATE', `invalid format string ${template}`);
  }

  return outputPath;
}

/**
 * Directory part of an output path, including the trailing separator
 */
export function outputDirectory(outputPath: string): string {
  return outputPath.slice(0, outputPath.lastIndexOf('/') + 1);
}
