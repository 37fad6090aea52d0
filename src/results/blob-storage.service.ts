import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { basename, extname, join, posix, resolve, sep } from 'path';
import { AppConfig } from '../config/app.config';

const UPLOAD_DIR = 'uploads';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Reduces an uploaded name to a safe stem and extension, e.g.
 * `"My Dog (1).JPG"` becomes `["My_Dog_1", ".jpg"]`.
 */
export function sanitizeFilename(filename: string): [string, string] {
  const name = basename(filename.replace(/\\/g, '/'));
  const ext = extname(name).toLowerCase().replace(/[^.a-z0-9]/g, '');
  const stem = name
    .slice(0, name.length - extname(name).length)
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\w.-]/g, '')
    .slice(0, 100);
  return [stem || 'image', ext];
}

/**
 * Stores uploaded images on the local filesystem under a date-partitioned
 * directory (`uploads/YYYY/MM/DD/`). Paths handed out are relative to the
 * media root and always use forward slashes.
 */
@Injectable()
export class BlobStorageService {
  private readonly logger = new Logger(BlobStorageService.name);

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  private get root(): string {
    return resolve(this.configService.get('media', { infer: true }).root);
  }

  async save(filename: string, content: Buffer, now: Date = new Date()): Promise<string> {
    const [stem, ext] = sanitizeFilename(filename);
    const folder = posix.join(
      UPLOAD_DIR,
      String(now.getFullYear()),
      pad(now.getMonth() + 1),
      pad(now.getDate()),
    );
    const relativePath = posix.join(folder, `${stem}_${randomBytes(4).toString('hex')}${ext}`);

    await mkdir(join(this.root, folder), { recursive: true });
    await writeFile(this.resolve(relativePath), content, { flag: 'wx' });
    this.logger.debug(`Stored ${relativePath} (${content.length} bytes)`);
    return relativePath;
  }

  /** Removes a stored blob; a blob that is already gone is not an error. */
  async remove(relativePath: string): Promise<void> {
    try {
      await unlink(this.resolve(relativePath));
    } catch (error) {
      if (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        error.code === 'ENOENT'
      ) {
        this.logger.warn(`Blob ${relativePath} was already missing`);
        return;
      }
      throw error;
    }
  }

  url(relativePath: string): string {
    return `${this.configService.get('media', { infer: true }).url}${relativePath}`;
  }

  resolve(relativePath: string): string {
    const absolute = resolve(this.root, relativePath);
    if (!absolute.startsWith(this.root + sep)) {
      throw new Error(`Refusing to access ${relativePath} outside the media root`);
    }
    return absolute;
  }
}
