import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ClassificationModule } from '../classification/classification.module';
import { BlobStorageService } from './blob-storage.service';
import { AnalysisResult } from './entities/analysis-result.entity';
import { ResultsController } from './results.controller';
import { ResultsService } from './results.service';

@Module({
  imports: [TypeOrmModule.forFeature([AnalysisResult]), ClassificationModule],
  controllers: [ResultsController],
  providers: [ResultsService, BlobStorageService],
  exports: [ResultsService],
})
export class ResultsModule {}
