import { injectable } from 'inversify';
import * as fs from 'fs/promises';
import * as path from 'path';
import { IFileSystemService } from '../interfaces';

@injectable()
export class FileSystemService implements IFileSystemService {
  async saveToFile(content: string, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  /** First `length` bytes of a file, fewer if the file is shorter. */
  async readHead(filePath: string, length: number): Promise<Buffer> {
    const handle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  async fileSize(filePath: string): Promise<number> {
    const stats = await fs.stat(filePath);
    return stats.size;
  }

  async removeFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
