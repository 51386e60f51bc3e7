import { promises as fs } from 'fs';
import path from 'path';
import { PigeonError } from '@pigeonpost/utils';

const EXTENSION = '.png';

export class Gallery {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  /** File stems of every PNG directly inside the output directory. */
  async listStems(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.outputDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => path.extname(entry) === EXTENSION)
      .map((entry) => path.basename(entry, EXTENSION))
      .sort();
  }

  pathFor(adjective: string): string {
    return path.join(this.outputDir, `${adjective}${EXTENSION}`);
  }

  async save(adjective: string, data: Buffer): Promise<string> {
    const filepath = this.pathFor(adjective);
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, data);
    return filepath;
  }

  async read(filepath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filepath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new PigeonError('FILE_NOT_FOUND', `No such image: ${filepath}`, { filepath }, { cause: error });
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
