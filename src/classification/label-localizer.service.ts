import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsString, validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { AppConfig } from '../config/app.config';

export class LabelEntry {
  @IsString()
  @IsNotEmpty()
  num!: string;

  @IsString()
  @IsNotEmpty()
  ja!: string;
}

@Injectable()
export class LabelLocalizerService implements OnModuleInit {
  private readonly logger = new Logger(LabelLocalizerService.name);
  private table: ReadonlyMap<string, string> | null = null;
  private loading: Promise<ReadonlyMap<string, string>> | null = null;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  /** Reads the reference file once; concurrent callers share the same read. */
  load(): Promise<ReadonlyMap<string, string>> {
    if (!this.loading) {
      this.loading = this.readTable().then(
        (table) => {
          this.table = table;
          return table;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        },
      );
    }
    return this.loading;
  }

  localize(classId: string): string | undefined {
    if (!this.table) {
      throw new Error('Label table has not been loaded');
    }
    return this.table.get(classId);
  }

  displayLabel(classId: string, nativeLabel: string): string {
    return this.localize(classId) ?? nativeLabel.replace(/_/g, ' ');
  }

  private async readTable(): Promise<ReadonlyMap<string, string>> {
    const file = this.configService.get('labels', { infer: true }).file;

    try {
      const entries: unknown = JSON.parse(await readFile(file, 'utf8'));
      if (!Array.isArray(entries)) {
        throw new Error('expected a JSON array of { num, ja } entries');
      }

      const table = new Map<string, string>();
      entries.forEach((item: unknown, index) => {
        if (typeof item !== 'object' || item === null || Array.isArray(item)) {
          throw new Error(`entry ${index} is not an object`);
        }
        const entry = plainToInstance(LabelEntry, item);
        const errors = validateSync(entry);
        if (errors.length > 0) {
          throw new Error(
            `entry ${index} is invalid (${errors.map((e) => e.property).join(', ')})`,
          );
        }
        // first entry wins
        if (!table.has(entry.num)) {
          table.set(entry.num, entry.ja);
        }
      });

      this.logger.log(`Loaded ${table.size} localized labels from ${file}`);
      return table;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not load label file ${file}: ${reason}`);
      throw new Error(`Label file ${file} is missing or malformed: ${reason}`);
    }
  }
}
