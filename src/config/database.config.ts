import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AnalysisResult } from '../results/entities/analysis-result.entity';

export type DatabaseType = 'mysql' | 'sqlite';

export function isDatabaseType(value: string | undefined): value is DatabaseType {
  return value === 'mysql' || value === 'sqlite';
}

export function buildDatabaseConfig(
  databaseType: DatabaseType,
  env: NodeJS.ProcessEnv = process.env,
): TypeOrmModuleOptions {
  const synchronize = (env.DB_SYNCHRONIZE ?? 'true') !== 'false';

  if (databaseType === 'sqlite') {
    return {
      type: 'sqljs',
      location: env.SQLITE_PATH || 'db.sqlite3',
      autoSave: true,
      synchronize,
      entities: [AnalysisResult],
    };
  }

  return {
    type: 'mysql',
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '3306', 10),
    username: env.DB_USERNAME || 'root',
    password: env.DB_PASSWORD ?? '',
    database: env.DB_NAME || 'image_classifier',
    charset: 'utf8mb4',
    synchronize,
    entities: [AnalysisResult],
  };
}
