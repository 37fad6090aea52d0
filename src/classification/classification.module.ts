import { Module } from '@nestjs/common';
import { ClassifierService } from './classifier.service';
import { ImagePreprocessorService } from './image-preprocessor.service';
import { LabelLocalizerService } from './label-localizer.service';
import { ResultFormatterService } from './result-formatter.service';

@Module({
  providers: [
    ImagePreprocessorService,
    ClassifierService,
    LabelLocalizerService,
    ResultFormatterService,
  ],
  exports: [
    ImagePreprocessorService,
    ClassifierService,
    LabelLocalizerService,
    ResultFormatterService,
  ],
})
export class ClassificationModule {}
