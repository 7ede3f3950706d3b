import * as fs from 'fs';
import DownloadError, { errorMessage } from '../models/download-error';
import { formatSize } from '../utils/formatter';
import { Logger } from './logger.service';

export class FileService {
  constructor(private logger: Logger) {}

  /**
   * Check whether anything exists at a path
   */
  public async exists(filePath: string): Promise<boolean> {
    try {
      await fs.promises.stat(filePath);
      return true;
    } catch (error) {
      return false;
    }
  }

  /**
   * Ensure a directory exists
   */
  public async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.promises.mkdir(dirPath, { recursive: true });
    } catch (error) {
      this.logger.error(`Error creating directory ${dirPath}: ${errorMessage(error)}`);
      throw new DownloadError('DIRECTORY_CREATION', `cannot create folders: ${dirPath}`, { cause: error });
    }
  }

  /**
   * Write a whole file, replacing anything at the path
   */
  public async writeFile(filePath: string, data: Buffer): Promise<void> {
    try {
      await fs.promises.writeFile(filePath, data);
      this.logger.debug(`Wrote ${formatSize(data.length)} to ${filePath}`);
    } catch (error) {
      throw new DownloadError('WRITE', `cannot write ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Read a readable stream to the end
   */
  public async readAll(stream: AsyncIterable<Buffer | string>): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks);
  }
}
