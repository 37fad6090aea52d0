import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { validateOrReject } from 'class-validator';
import { Repository } from 'typeorm';
import { RankedPrediction, UploadedImage } from '../classification/classification.types';
import { LabelLocalizerService } from '../classification/label-localizer.service';
import { toPercentScore } from '../classification/percent';
import { describeError } from '../common/describe-error';
import { fail, ok, Result } from '../common/result';
import { AppConfig, modelVersionTag } from '../config/app.config';
import { BlobStorageService } from './blob-storage.service';
import { AnalysisResult } from './entities/analysis-result.entity';
import { ITEMS_PER_PAGE, resolvePage } from './pagination';

const TOP_LABELS = 5;

export interface NotFoundFailure {
  kind: 'not_found';
  id: number;
}

export interface ResultPage {
  items: AnalysisResult[];
  page: number;
  num_pages: number;
  total: number;
  page_size: number;
  has_next: boolean;
  has_previous: boolean;
  search: string;
}

export interface LabelCount {
  prediction_label: string;
  count: number;
}

export interface ResultStatistics {
  total_analyses: number;
  average_confidence: number;
  top_predictions: LabelCount[];
  model_name: string;
}

// '!' is the LIKE escape character in every query below.
function escapeLike(term: string): string {
  return term.replace(/[!%_]/g, '!$&');
}

@Injectable()
export class ResultsService {
  private readonly logger = new Logger(ResultsService.name);

  constructor(
    @InjectRepository(AnalysisResult)
    private readonly analysisResultRepository: Repository<AnalysisResult>,
    private readonly blobStorage: BlobStorageService,
    private readonly labelLocalizer: LabelLocalizerService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  /**
   * Stores the uploaded image and a record of its top prediction. Returns
   * null when either step fails; the failure is logged and the analysis
   * itself is still reported to the caller.
   */
  async save(
    file: UploadedImage,
    top: RankedPrediction,
    processingTime: number,
  ): Promise<AnalysisResult | null> {
    let image: string | null = null;
    try {
      image = await this.blobStorage.save(file.filename, file.buffer);

      const record = this.analysisResultRepository.create({
        image,
        original_filename: file.filename.slice(0, 255) || null,
        prediction_label: this.labelLocalizer.displayLabel(top.class_id, top.native_label),
        prediction_score: toPercentScore(top.probability),
        model_version: modelVersionTag(this.configService.get('model', { infer: true })),
        processing_time: processingTime,
      });
      await validateOrReject(record);

      const saved = await this.analysisResultRepository.save(record);
      this.logger.log(`Saved analysis result ${saved.id} (${saved.prediction_label})`);
      return saved;
    } catch (error) {
      this.logger.error(`Could not save analysis result: ${describeError(error)}`);
      if (image) {
        await this.discardBlob(image);
      }
      return null;
    }
  }

  findOne(id: number): Promise<AnalysisResult | null> {
    return this.analysisResultRepository.findOneBy({ id });
  }

  /** Newest first, optionally filtered by a case-insensitive label substring. */
  async list(rawPage: unknown, search = ''): Promise<ResultPage> {
    const term = search.trim();
    const query = this.analysisResultRepository.createQueryBuilder('result');
    if (term) {
      query.where("LOWER(result.prediction_label) LIKE :pattern ESCAPE '!'", {
        pattern: `%${escapeLike(term.toLowerCase())}%`,
      });
    }

    const total = await query.getCount();
    const window = resolvePage(rawPage, total, ITEMS_PER_PAGE);
    const items = await query
      .orderBy('result.created_at', 'DESC')
      .addOrderBy('result.id', 'DESC')
      .offset(window.offset)
      .limit(window.limit)
      .getMany();

    return {
      items,
      page: window.page,
      num_pages: window.numPages,
      total,
      page_size: window.limit,
      has_next: window.page < window.numPages,
      has_previous: window.page > 1,
      search: term,
    };
  }

  /**
   * Deletes the record, then its image. A failure to remove the image is
   * logged and leaves an orphaned file behind.
   */
  async delete(id: number): Promise<Result<AnalysisResult, NotFoundFailure>> {
    const record = await this.findOne(id);
    if (!record) {
      return fail({ kind: 'not_found', id });
    }

    await this.analysisResultRepository.delete({ id });
    this.logger.log(`Deleted analysis result ${id}`);
    await this.discardBlob(record.image);
    return ok(record);
  }

  async statistics(): Promise<ResultStatistics> {
    const total = await this.analysisResultRepository.count();

    const average = await this.analysisResultRepository
      .createQueryBuilder('result')
      .select('AVG(result.prediction_score)', 'average')
      .getRawOne<{ average: number | string | null }>();

    const rows = await this.analysisResultRepository
      .createQueryBuilder('result')
      .select('result.prediction_label', 'prediction_label')
      .addSelect('COUNT(result.id)', 'count')
      .groupBy('result.prediction_label')
      .orderBy('COUNT(result.id)', 'DESC')
      .addOrderBy('result.prediction_label', 'ASC')
      .limit(TOP_LABELS)
      .getRawMany<{ prediction_label: string; count: number | string }>();

    return {
      total_analyses: total,
      average_confidence: total === 0 ? 0 : Number(Number(average?.average ?? 0).toFixed(2)),
      top_predictions: rows.map((row) => ({
        prediction_label: row.prediction_label,
        count: Number(row.count),
      })),
      model_name: this.configService.get('model', { infer: true }).name,
    };
  }

  imageUrl(record: AnalysisResult): string {
    return this.blobStorage.url(record.image);
  }

  private async discardBlob(image: string): Promise<void> {
    try {
      await this.blobStorage.remove(image);
    } catch (error) {
      this.logger.error(`Could not remove stored image ${image}: ${describeError(error)}`);
    }
  }
}
