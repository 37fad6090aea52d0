import { Module } from '@nestjs/common';
import { ClassificationModule } from '../classification/classification.module';
import { ResultsModule } from '../results/results.module';
import { AnalysisService } from './analysis.service';
import { PredictController } from './predict.controller';

@Module({
  imports: [ClassificationModule, ResultsModule],
  controllers: [PredictController],
  providers: [AnalysisService],
})
export class PredictModule {}
