import { Injectable, Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import {
  AnalysisFailure,
  FormattedPrediction,
  UploadedImage,
} from '../classification/classification.types';
import { ClassifierService } from '../classification/classifier.service';
import {
  ImagePreprocessorService,
  NO_FILE_SELECTED,
} from '../classification/image-preprocessor.service';
import { ResultFormatterService } from '../classification/result-formatter.service';
import { fail, ok, Result } from '../common/result';
import { AnalysisResult } from '../results/entities/analysis-result.entity';
import { ResultsService } from '../results/results.service';

export interface AnalysisOutcome {
  predictions: FormattedPrediction[];
  /** Null when the result could not be stored. */
  result: AnalysisResult | null;
  image_url: string | null;
  /** Seconds spent decoding and classifying the image. */
  processing_time: number;
}

/**
 * Runs one upload through validation, preprocessing, inference and
 * formatting, then stores the top prediction. A failure to store the result
 * does not fail the analysis.
 *
 * Throws `ModelNotLoadedError` when called before the classifier is ready.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly preprocessor: ImagePreprocessorService,
    private readonly classifier: ClassifierService,
    private readonly formatter: ResultFormatterService,
    private readonly resultsService: ResultsService,
  ) {}

  async analyze(
    file: UploadedImage | null,
  ): Promise<Result<AnalysisOutcome, AnalysisFailure>> {
    if (!file) {
      this.logger.warn('Rejected request without an image');
      return fail(NO_FILE_SELECTED);
    }

    const started = performance.now();

    const prepared = await this.preprocessor.prepare(file);
    if (!prepared.ok) {
      this.logger.warn(`Rejected ${file.filename}: ${prepared.error.message}`);
      return prepared;
    }

    const ranked = await this.classifier.infer(prepared.value);
    if (!ranked.ok) {
      return ranked;
    }

    const processingTime = (performance.now() - started) / 1000;
    const predictions = this.formatter.format(ranked.value);
    const [top] = ranked.value;
    const result = await this.resultsService.save(file, top, processingTime);

    this.logger.log(
      `Analyzed ${file.filename} as ${predictions[0].name} (${predictions[0].prob}) in ${processingTime.toFixed(2)}s`,
    );

    return ok({
      predictions,
      result,
      image_url: result ? this.resultsService.imageUrl(result) : null,
      processing_time: processingTime,
    });
  }
}
