import { Injectable } from '@nestjs/common';
import { FormattedPrediction, RankedPrediction } from './classification.types';
import { LabelLocalizerService } from './label-localizer.service';
import { toPercentString } from './percent';

@Injectable()
export class ResultFormatterService {
  constructor(private readonly labelLocalizer: LabelLocalizerService) {}

  format(ranked: readonly RankedPrediction[]): FormattedPrediction[] {
    return ranked.map((prediction) => ({
      name: this.labelLocalizer.displayLabel(prediction.class_id, prediction.native_label),
      prob: toPercentString(prediction.probability),
      raw_prob: prediction.probability * 100,
      class_id: prediction.class_id,
    }));
  }
}
