import { DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import appConfig from './config/app.config';
import { buildDatabaseConfig, DatabaseType, isDatabaseType } from './config/database.config';
import { PredictModule } from './predict/predict.module';
import { ResultsModule } from './results/results.module';

export class AppModule {
  static forRoot(databaseType: string | undefined): DynamicModule {
    if (!isDatabaseType(databaseType)) {
      throw new Error(`Invalid database type: ${databaseType}`);
    }
    const type: DatabaseType = databaseType;

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [() => appConfig()],
        }),
        // Built lazily so values from .env are visible.
        TypeOrmModule.forRootAsync({ useFactory: () => buildDatabaseConfig(type) }),
        ResultsModule,
        PredictModule,
      ],
      controllers: [AppController],
    };
  }
}
