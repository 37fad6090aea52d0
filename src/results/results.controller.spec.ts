import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { ok, fail } from '../common/result';
import { AnalysisResult } from './entities/analysis-result.entity';
import { ResultsController } from './results.controller';
import { ResultsService } from './results.service';

function record(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return Object.assign(new AnalysisResult(), {
    id: 7,
    image: 'uploads/2024/01/05/dog_0a1b2c3d.jpg',
    original_filename: 'dog.jpg',
    prediction_label: 'ゴールデン・レトリバー',
    prediction_score: 95.5,
    model_version: 'EfficientNetB0-v1.0',
    processing_time: 0.31,
    created_at: new Date('2024-01-05T10:00:00.000Z'),
    updated_at: new Date('2024-01-05T10:00:00.000Z'),
    ...overrides,
  });
}

describe('ResultsController', () => {
  let app: NestFastifyApplication;

  const mockResultsService = {
    list: jest.fn(),
    findOne: jest.fn(),
    delete: jest.fn(),
    statistics: jest.fn(),
    imageUrl: jest.fn((result: AnalysisResult) => `/media/${result.image}`),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ResultsController],
      providers: [{ provide: ResultsService, useValue: mockResultsService }],
    }).compile();

    app = module.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    jest.clearAllMocks();
    await app.close();
  });

  it('should list a page of results with display fields', async () => {
    mockResultsService.list.mockResolvedValue({
      items: [record()],
      page: 2,
      num_pages: 2,
      total: 11,
      page_size: 10,
      has_next: false,
      has_previous: true,
      search: 'dog',
    });

    const response = await app.inject({
      method: 'GET',
      url: '/history?page=2&search=dog&notice=Hello',
    });

    expect(response.statusCode).toBe(200);
    expect(mockResultsService.list).toHaveBeenCalledWith('2', 'dog');
    const body = response.json();
    expect(body.status).toBe('success');
    expect(body.notice).toBe('Hello');
    expect(body.data).toMatchObject({ page: 2, num_pages: 2, total: 11, has_previous: true });
    expect(body.data.items).toEqual([
      {
        id: 7,
        image_url: '/media/uploads/2024/01/05/dog_0a1b2c3d.jpg',
        image_filename: 'dog_0a1b2c3d.jpg',
        original_filename: 'dog.jpg',
        prediction_label: 'ゴールデン・レトリバー',
        prediction_score: 95.5,
        formatted_score: '95.50%',
        confidence_level: 'very_high',
        model_version: 'EfficientNetB0-v1.0',
        processing_time: 0.31,
        created_at: '2024-01-05T10:00:00.000Z',
        updated_at: '2024-01-05T10:00:00.000Z',
        is_recent: false,
      },
    ]);
  });

  it('should answer 500 when listing fails', async () => {
    mockResultsService.list.mockRejectedValue(new Error('connection lost'));

    const response = await app.inject({ method: 'GET', url: '/history' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Failed to load the analysis history.',
    });
  });

  it('should return one result', async () => {
    mockResultsService.findOne.mockResolvedValue(record({ prediction_score: 72 }));

    const response = await app.inject({ method: 'GET', url: '/history/7' });

    expect(response.statusCode).toBe(200);
    expect(mockResultsService.findOne).toHaveBeenCalledWith(7);
    expect(response.json().data).toMatchObject({
      id: 7,
      formatted_score: '72.00%',
      confidence_level: 'high',
    });
  });

  it('should answer 404 for an unknown result', async () => {
    mockResultsService.findOne.mockResolvedValue(null);

    const response = await app.inject({ method: 'GET', url: '/history/41' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      status: 'error',
      message: 'Analysis result 41 was not found',
    });
  });

  it('should reject an id that is not a number', async () => {
    const response = await app.inject({ method: 'GET', url: '/history/abc' });

    expect(response.statusCode).toBe(400);
    expect(mockResultsService.findOne).not.toHaveBeenCalled();
  });

  it('should redirect to the history after deleting', async () => {
    mockResultsService.delete.mockResolvedValue(ok(record()));

    const response = await app.inject({ method: 'POST', url: '/delete/7' });

    expect(response.statusCode).toBe(303);
    expect(response.headers.location).toBe(
      '/history?notice=Deleted%20analysis%20result%20(ID%3A%207)',
    );
  });

  it('should answer 404 when deleting an unknown result', async () => {
    mockResultsService.delete.mockResolvedValue(fail({ kind: 'not_found', id: 9 }));

    const response = await app.inject({ method: 'POST', url: '/delete/9' });

    expect(response.statusCode).toBe(404);
  });

  it('should redirect with a failure notice when deletion fails', async () => {
    mockResultsService.delete.mockRejectedValue(new Error('database is locked'));

    const response = await app.inject({ method: 'POST', url: '/delete/7' });

    expect(response.statusCode).toBe(303);
    expect(response.headers.location).toBe(
      '/history?notice=Failed%20to%20delete%20the%20analysis%20result.',
    );
  });

  it('should return statistics', async () => {
    const statistics = {
      total_analyses: 3,
      average_confidence: 75.17,
      top_predictions: [{ prediction_label: 'テスト犬', count: 2 }],
      model_name: 'EfficientNetB0',
    };
    mockResultsService.statistics.mockResolvedValue(statistics);

    const response = await app.inject({ method: 'GET', url: '/api/statistics' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'success', data: statistics });
  });
});
