import { Command, CommanderError } from 'commander';
import { AppConfig, loadConfig, missingGatewayKeys } from './config/config';
import DownloadError, { errorMessage } from './models/download-error';
import type {
  ActiveSession,
  Credentials,
  KeyProvider,
  MetadataProvider,
  StreamProvider
} from './models/provider.model';
import type { RunSummary, TrackId } from './models/track.model';
import { CatalogClient } from './services/catalog.service';
import { AudioDecryptor } from './services/decrypt.service';
import { DownloadManager } from './services/download.service';
import { FileService } from './services/file.service';
import { Logger, LoggerOptions, parseLogLevel } from './services/logger.service';
import { DownloadPipeline } from './services/pipeline.service';
import { LineWriter, ProgressReporter } from './services/progress.service';
import { TrackSetResolver } from './services/resolver.service';
import { SessionService } from './services/session.service';
import { TrackFormatResolver } from './services/track.service';
import { vorbisCommentRewriter } from './utils/ogg';
import { DEFAULT_OUTPUT_TEMPLATE } from './utils/output-path';
import { classify } from './utils/reference-parser';

interface CliOptions {
  user?: string;
  pass?: string;
  format?: string;
  rate?: string;
  logLevel?: string;
  logFile?: string;
  config?: string;
}

export interface CatalogProvider extends MetadataProvider, KeyProvider, StreamProvider {}

/**
 * Everything `run` reaches outside the process through
 */
export interface CliDependencies {
  createLogger(options: Partial<LoggerOptions>): Logger;
  login(credentials: Credentials, config: AppConfig, logger: Logger): Promise<ActiveSession>;
  openCatalog(session: ActiveSession, config: AppConfig, logger: Logger): CatalogProvider;
  write: LineWriter;
  colored: boolean;
}

export const defaultDependencies: CliDependencies = {
  createLogger: options => new Logger(options),
  login: (credentials, config, logger) => new SessionService(logger, config).connect(credentials),
  openCatalog: (session, config, logger) => CatalogClient.create(session, config, logger),
  write: line => process.stdout.write(`${line}\n`),
  colored: process.stdout.isTTY === true
};

function createProgram(write: LineWriter): Command {
  return new Command()
    .name('spotify-ogg-dl')
    .description('Download tracks, playlists, albums and artists as tagged Ogg Vorbis files')
    .version('1.0.0')
    .usage('[OPTIONS] URIs...')
    .argument('[resources...]', 'spotify:<kind>:<id> URIs or open.spotify.com URLs')
    .option('-u, --user <user>', 'user login name, required')
    .option('-p, --pass <pass>', 'user password, required')
    .option(
      '-f, --format <format>',
      `output format to use, ${DEFAULT_OUTPUT_TEMPLATE} by default. Available format specifiers are ` +
      '{author}, {album}, {name} and {ext}. {author} is only the main artist; ' +
      'all artists are still written to the track metadata'
    )
    .option('-r, --rate <number>', 'catalog requests per minute')
    .option('-l, --log-level <level>', 'log level (debug, info, warn, error)')
    .option('--log-file <path>', 'also log to file')
    .option(
      '--config <path>',
      'path to config file; it must set apiBaseUrl and authUrl to a compatible catalog gateway'
    )
    .exitOverride()
    .configureOutput({
      writeOut: text => write(text.trimEnd()),
      writeErr: text => write(text.trimEnd())
    });
}

/**
 * Run the command line and resolve to the process exit code
 */
export async function run(argv: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  const program = createProgram(deps.write);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    // --help, --version and usage errors
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  const resources = program.args;
  if (!options.user || !options.pass || resources.length === 0) {
    program.outputHelp();
    return 0;
  }

  // Load config, then let command line options override it
  const config = loadConfig(options.config);
  if (options.format) {
    config.outputTemplate = options.format;
  }
  if (options.rate) {
    const rate = parseInt(options.rate, 10);
    if (rate > 0) {
      config.requestsPerMinute = rate;
    }
  }
  if (options.logLevel) {
    config.logLevel = options.logLevel;
  }

  const logger = deps.createLogger({
    level: parseLogLevel(config.logLevel),
    logToConsole: true,
    logToFile: !!options.logFile,
    logFilePath: options.logFile
  });

  try {
    return await download(
      { username: options.user, password: options.pass },
      resources,
      config,
      logger,
      deps
    );
  } finally {
    await logger.close();
  }
}

async function download(
  credentials: Credentials,
  resources: string[],
  config: AppConfig,
  logger: Logger,
  deps: CliDependencies
): Promise<number> {
  const missing = missingGatewayKeys(config);
  if (missing.length > 0) {
    logger.error(`no catalog gateway configured, set ${missing.join(' and ')} in the config file`);
    return 1;
  }

  let session: ActiveSession;
  try {
    session = await deps.login(credentials, config, logger.child('session'));
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  // Initialize services
  const catalog = deps.openCatalog(session, config, logger.child('catalog'));
  const pipeline = new DownloadPipeline(logger.child('pipeline'), {
    keys: catalog,
    streams: catalog,
    decryptor: new AudioDecryptor(),
    rewriter: vorbisCommentRewriter,
    files: new FileService(logger.child('files'))
  });
  const downloadManager = new DownloadManager(
    logger.child('download'),
    new TrackFormatResolver(catalog, logger.child('tracks')),
    pipeline
  );
  const resolver = new TrackSetResolver(catalog, logger.child('resolver'));
  const reporter = new ProgressReporter(downloadManager, pipeline, deps.write, { colored: deps.colored });

  reporter.loggedIn(session.username);
  reporter.inputHeader();

  const trackIds = new Set<TrackId>();
  for (const line of resources) {
    const reference = classify(line);
    if (!reference) {
      reporter.unrecognized(line);
      continue;
    }

    reporter.reference(reference);
    const result = await resolver.resolve(reference, trackIds);
    if (result.status === 'skipped') {
      reporter.referenceSkipped(result.reason);
    }
  }

  if (trackIds.size === 0) {
    logger.error("didn't get any tracks, aborting...");
    return 0;
  }

  reporter.parsed(trackIds.size);

  let summary: RunSummary;
  try {
    summary = await downloadManager.run(trackIds, config.outputTemplate);
  } catch (error) {
    if (!(error instanceof DownloadError) || !error.isFatal) throw error;
    logger.error(`${error.message}, aborting...`);
    return 1;
  }

  reporter.summary(summary);
  return 0;
}
