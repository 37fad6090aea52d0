import { Controller, Get, HttpStatus, Logger, Post, Req, Res } from '@nestjs/common';
import type { MultipartFile } from '@fastify/multipart';
import {
  ApiBody,
  ApiConsumes,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ModelNotLoadedError, UploadedImage } from '../classification/classification.types';
import { ClassifierService } from '../classification/classifier.service';
import { describeError } from '../common/describe-error';
import { AnalysisService } from './analysis.service';

export const UPLOAD_FIELD = 'imageFile';

@ApiTags('predict')
@Controller()
export class PredictController {
  private readonly logger = new Logger(PredictController.name);

  constructor(
    private readonly analysisService: AnalysisService,
    private readonly classifierService: ClassifierService,
  ) {}

  @ApiConsumes('multipart/form-data')
  @ApiBody({
    description: 'Image to classify (jpg, jpeg, png, bmp or gif, at most 10MB)',
    schema: {
      type: 'object',
      properties: {
        [UPLOAD_FIELD]: { type: 'string', format: 'binary' },
      },
    },
  })
  @ApiResponse({
    status: 200,
    description: 'Top five predictions; status is "warning" when the result was not stored',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'success' },
        message: { type: 'string', example: 'Image analysis completed (processing time: 0.42s)' },
        predictions: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string', example: 'ゴールデン・レトリバー' },
              prob: { type: 'string', example: '95.50%' },
              raw_prob: { type: 'number', example: 95.50234 },
              class_id: { type: 'string', example: 'n02099601' },
            },
          },
        },
        image_url: { type: 'string', nullable: true, example: '/media/uploads/2024/01/05/dog_0a1b2c3d.jpg' },
        result_id: { type: 'number', nullable: true, example: 12 },
        processing_time: { type: 'number', example: 0.42 },
        saved: { type: 'boolean', example: true },
      },
    },
  })
  @ApiResponse({ status: 400, description: 'The upload is missing, invalid or unreadable' })
  @ApiResponse({ status: 500, description: 'Inference failed' })
  @ApiResponse({ status: 503, description: 'The model is not loaded' })
  @ApiOperation({ summary: 'Classify an uploaded image and store the top prediction' })
  @Post('predict')
  async predict(@Req() request: FastifyRequest, @Res() response: FastifyReply) {
    try {
      const file = await this.readUpload(request);
      const outcome = await this.analysisService.analyze(file);

      if (!outcome.ok) {
        const status =
          outcome.error.kind === 'inference'
            ? HttpStatus.INTERNAL_SERVER_ERROR
            : HttpStatus.BAD_REQUEST;
        return response.status(status).send({ status: 'error', message: outcome.error.message });
      }

      const { predictions, result, image_url, processing_time } = outcome.value;
      return response.status(HttpStatus.OK).send({
        status: result ? 'success' : 'warning',
        message: result
          ? `Image analysis completed (processing time: ${processing_time.toFixed(2)}s)`
          : 'Image analysis completed, but the result could not be saved.',
        predictions,
        image_url,
        result_id: result ? result.id : null,
        processing_time,
        saved: result !== null,
      });
    } catch (error) {
      if (error instanceof ModelNotLoadedError) {
        return response.status(HttpStatus.SERVICE_UNAVAILABLE).send({
          status: 'error',
          message: 'The classification model is not available. Please try again later.',
        });
      }
      this.logger.error(`Unexpected failure while analyzing an upload: ${describeError(error)}`);
      return response.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        status: 'error',
        message: 'An unexpected error occurred. Please try again.',
      });
    }
  }

  @ApiOperation({ summary: 'Describe the loaded classification model' })
  @ApiResponse({
    status: 200,
    description: 'Model name, version, load state and tensor shapes',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'success' },
        data: {
          type: 'object',
          properties: {
            name: { type: 'string', example: 'EfficientNetB0' },
            version: { type: 'string', example: 'v1.0' },
            is_loaded: { type: 'boolean', example: true },
            input_shape: { type: 'array', items: { type: 'number' }, example: [null, 224, 224, 3] },
            output_shape: { type: 'array', items: { type: 'number' }, example: [null, 1000] },
            classes: { type: 'number', example: 1000 },
          },
        },
      },
    },
  })
  @Get('api/model')
  modelInfo(@Res() response: FastifyReply) {
    return response
      .status(HttpStatus.OK)
      .send({ status: 'success', data: this.classifierService.getModelInfo() });
  }

  private async readUpload(request: FastifyRequest): Promise<UploadedImage | null> {
    if (!request.isMultipart()) {
      return null;
    }
    const part: MultipartFile | undefined = await request.file();
    if (!part) {
      return null;
    }
    if (part.fieldname !== UPLOAD_FIELD) {
      part.file.resume();
      return null;
    }
    return {
      filename: part.filename,
      mimetype: part.mimetype,
      buffer: await part.toBuffer(),
    };
  }
}
