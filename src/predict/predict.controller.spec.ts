import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { tmpdir } from 'os';
import { multipartUpload } from '../../test/multipart';
import { ModelNotLoadedError } from '../classification/classification.types';
import { ClassifierService } from '../classification/classifier.service';
import { fail, ok } from '../common/result';
import { AnalysisResult } from '../results/entities/analysis-result.entity';
import { configureApp } from '../setup-app';
import { AnalysisService } from './analysis.service';
import { PredictController } from './predict.controller';

const PREDICTIONS = [
  { name: 'ゴールデン・レトリバー', prob: '95.50%', raw_prob: 95.50234, class_id: 'n02099601' },
];

describe('PredictController', () => {
  let app: NestFastifyApplication;

  const mockAnalysisService = { analyze: jest.fn() };
  const mockClassifierService = { getModelInfo: jest.fn() };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [PredictController],
      providers: [
        { provide: AnalysisService, useValue: mockAnalysisService },
        { provide: ClassifierService, useValue: mockClassifierService },
      ],
    }).compile();

    app = module.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    await configureApp(app, { root: tmpdir(), url: '/media/' });
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    jest.clearAllMocks();
    await app.close();
  });

  function post(field = 'imageFile', filename = 'dog.jpg', content = Buffer.from([0xff, 0xd8])) {
    return app.inject({
      method: 'POST',
      url: '/predict',
      ...multipartUpload(field, filename, content, 'image/jpeg'),
    });
  }

  it('should pass the uploaded file to the analysis', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      fail({ kind: 'validation', message: 'The selected file is empty' }),
    );

    await post('imageFile', 'dog.jpg', Buffer.from([0xff, 0xd8]));

    expect(mockAnalysisService.analyze).toHaveBeenCalledWith({
      filename: 'dog.jpg',
      mimetype: 'image/jpeg',
      buffer: Buffer.from([0xff, 0xd8]),
    });
  });

  it('should treat a request without the image field as having no file', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      fail({ kind: 'validation', message: 'No file was selected' }),
    );

    const response = await post('attachment');

    expect(mockAnalysisService.analyze).toHaveBeenCalledWith(null);
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ status: 'error', message: 'No file was selected' });
  });

  it('should treat a non-multipart request as having no file', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      fail({ kind: 'validation', message: 'No file was selected' }),
    );

    const response = await app.inject({
      method: 'POST',
      url: '/predict',
      payload: { imageFile: 'x' },
    });

    expect(mockAnalysisService.analyze).toHaveBeenCalledWith(null);
    expect(response.statusCode).toBe(400);
  });

  it('should answer 400 for an unreadable image', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      fail({ kind: 'decode', message: 'Failed to read the image. Please try a different image.' }),
    );

    const response = await post();

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Failed to read the image. Please try a different image.',
    });
  });

  it('should answer 500 when inference fails', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      fail({ kind: 'inference', message: 'Image analysis failed. Please try again.' }),
    );

    const response = await post();

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Image analysis failed. Please try again.',
    });
  });

  it('should answer 503 while the model is not loaded', async () => {
    mockAnalysisService.analyze.mockRejectedValue(new ModelNotLoadedError());

    const response = await post();

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'The classification model is not available. Please try again later.',
    });
  });

  it('should answer 500 without details for an unexpected error', async () => {
    mockAnalysisService.analyze.mockRejectedValue(new Error('ENOSPC: /var/lib/media'));

    const response = await post();

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'An unexpected error occurred. Please try again.',
    });
  });

  it('should report a stored analysis', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      ok({
        predictions: PREDICTIONS,
        result: Object.assign(new AnalysisResult(), { id: 12 }),
        image_url: '/media/uploads/2024/01/05/dog_0a1b2c3d.jpg',
        processing_time: 0.4251,
      }),
    );

    const response = await post();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'success',
      message: 'Image analysis completed (processing time: 0.43s)',
      predictions: PREDICTIONS,
      image_url: '/media/uploads/2024/01/05/dog_0a1b2c3d.jpg',
      result_id: 12,
      processing_time: 0.4251,
      saved: true,
    });
  });

  it('should warn when the analysis could not be stored', async () => {
    mockAnalysisService.analyze.mockResolvedValue(
      ok({ predictions: PREDICTIONS, result: null, image_url: null, processing_time: 0.2 }),
    );

    const response = await post();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'warning',
      message: 'Image analysis completed, but the result could not be saved.',
      predictions: PREDICTIONS,
      image_url: null,
      result_id: null,
      processing_time: 0.2,
      saved: false,
    });
  });

  it('should describe the model', async () => {
    const info = {
      name: 'EfficientNetB0',
      version: 'v1.0',
      is_loaded: true,
      input_shape: [null, 224, 224, 3],
      output_shape: [null, 1000],
      classes: 1000,
    };
    mockClassifierService.getModelInfo.mockReturnValue(info);

    const response = await app.inject({ method: 'GET', url: '/api/model' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'success', data: info });
  });
});
