import * as fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Logger } from './logger.service';

export class FileService {
  constructor(private logger: Logger) {}

  /**
   * Ensure a directory exists, creating parents as needed
   */
  public async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.promises.mkdir(dirPath, { recursive: true });
    } catch (error: unknown) {
      this.logger.error(`Error creating directory ${dirPath}: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  /**
   * Stream a body to disk through a temporary ".download" file that is renamed
   * into place once complete. Both streams are closed before this settles,
   * and the temporary file is removed on failure.
   */
  public async writeStream(source: Readable, filePath: string, chunkSize: number): Promise<number> {
    const tempFilePath = `${filePath}.download`;
    const writer = fs.createWriteStream(tempFilePath, { flags: 'w', highWaterMark: chunkSize });
    
    let bytesWritten = 0;
    source.on('data', (chunk: Buffer) => {
      bytesWritten += chunk.length;
    });
    
    try {
      await pipeline(source, writer);
      await fs.promises.rename(tempFilePath, filePath);
    } catch (error) {
      await this.deleteFile(tempFilePath);
      throw error;
    }
    
    return bytesWritten;
  }

  /**
   * Delete a file if it exists
   */
  public async deleteFile(filePath: string): Promise<boolean> {
    try {
      await fs.promises.unlink(filePath);
      return true;
    } catch (error) {
      return false;
    }
  }
}
