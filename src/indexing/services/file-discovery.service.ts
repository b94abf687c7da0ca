import { Injectable, Logger } from '@nestjs/common';
import { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { DirectoryScanError } from '../errors/directory-scan.error';

/**
 * Recursive lister of the documents under a root directory.
 *
 * Only regular files are returned. Symbolic links are not followed, and
 * sockets, FIFOs and devices are skipped. Paths are built by joining the root
 * with each relative entry, so they double as stable document IDs.
 */
@Injectable()
export class FileDiscoveryService {
  private readonly logger = new Logger(FileDiscoveryService.name);

  /**
   * All regular files under `root`, sorted. Rejects with DirectoryScanError
   * if any directory in the tree cannot be read.
   */
  async listFiles(root: string): Promise<string[]> {
    const files: string[] = [];
    await this.walk(root, files);
    files.sort();

    this.logger.debug(`Found ${files.length} files under ${root}`);
    return files;
  }

  private async walk(directory: string, files: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new DirectoryScanError(directory, error);
    }

    for (const entry of entries) {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(path, files);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  }
}
