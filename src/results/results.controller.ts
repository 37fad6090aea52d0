import {
  Controller,
  Get,
  HttpStatus,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { FastifyReply } from 'fastify';
import { describeError } from '../common/describe-error';
import { ListResultsQueryDto } from './dto/list-results-query.dto';
import { AnalysisResult } from './entities/analysis-result.entity';
import { ResultView, toResultView } from './result-view';
import { ResultsService } from './results.service';

@ApiTags('results')
@Controller()
export class ResultsController {
  private readonly logger = new Logger(ResultsController.name);

  constructor(private readonly resultsService: ResultsService) {}

  @ApiOperation({ summary: 'List stored analysis results, newest first' })
  @ApiResponse({
    status: 200,
    description: 'One page of results with pagination metadata',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'success' },
        notice: { type: 'string', nullable: true, example: 'Deleted analysis result (ID: 3)' },
        data: {
          type: 'object',
          properties: {
            items: { type: 'array', items: { type: 'object' } },
            page: { type: 'number', example: 1 },
            num_pages: { type: 'number', example: 3 },
            total: { type: 'number', example: 27 },
            page_size: { type: 'number', example: 10 },
            has_next: { type: 'boolean', example: true },
            has_previous: { type: 'boolean', example: false },
            search: { type: 'string', example: '' },
          },
        },
      },
    },
  })
  @Get('history')
  async list(@Res() response: FastifyReply, @Query() query: ListResultsQueryDto) {
    try {
      const search = typeof query.search === 'string' ? query.search : '';
      const page = await this.resultsService.list(query.page, search);
      return response.status(HttpStatus.OK).send({
        status: 'success',
        notice: typeof query.notice === 'string' ? query.notice : null,
        data: { ...page, items: page.items.map((record) => this.view(record)) },
      });
    } catch (error) {
      this.logger.error(`Could not list analysis results: ${describeError(error)}`);
      return response.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        status: 'error',
        message: 'Failed to load the analysis history.',
      });
    }
  }

  @ApiOperation({ summary: 'Fetch one analysis result' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: 200, description: 'The stored result' })
  @ApiResponse({ status: 404, description: 'No result has this id' })
  @Get('history/:id')
  async findOne(@Res() response: FastifyReply, @Param('id', ParseIntPipe) id: number) {
    try {
      const record = await this.resultsService.findOne(id);
      if (!record) {
        return response.status(HttpStatus.NOT_FOUND).send({
          status: 'error',
          message: `Analysis result ${id} was not found`,
        });
      }
      return response.status(HttpStatus.OK).send({ status: 'success', data: this.view(record) });
    } catch (error) {
      this.logger.error(`Could not load analysis result ${id}: ${describeError(error)}`);
      return response.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        status: 'error',
        message: 'Failed to load the analysis result.',
      });
    }
  }

  @ApiOperation({ summary: 'Delete an analysis result and its image' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: 303, description: 'Redirects to the history with a notice' })
  @ApiResponse({ status: 404, description: 'No result has this id' })
  @Post('delete/:id')
  async remove(@Res() response: FastifyReply, @Param('id', ParseIntPipe) id: number) {
    let notice: string;
    try {
      const result = await this.resultsService.delete(id);
      if (!result.ok) {
        return response.status(HttpStatus.NOT_FOUND).send({
          status: 'error',
          message: `Analysis result ${id} was not found`,
        });
      }
      notice = `Deleted analysis result (ID: ${id})`;
    } catch (error) {
      this.logger.error(`Could not delete analysis result ${id}: ${describeError(error)}`);
      notice = 'Failed to delete the analysis result.';
    }
    return response.redirect(
      HttpStatus.SEE_OTHER,
      `/history?notice=${encodeURIComponent(notice)}`,
    );
  }

  @ApiOperation({ summary: 'Aggregate statistics over stored results' })
  @ApiResponse({
    status: 200,
    description: 'Totals, average confidence and the most frequent labels',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'success' },
        data: {
          type: 'object',
          properties: {
            total_analyses: { type: 'number', example: 27 },
            average_confidence: { type: 'number', example: 81.42 },
            top_predictions: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  prediction_label: { type: 'string', example: 'ゴールデン・レトリバー' },
                  count: { type: 'number', example: 6 },
                },
              },
            },
            model_name: { type: 'string', example: 'EfficientNetB0' },
          },
        },
      },
    },
  })
  @Get('api/statistics')
  async statistics(@Res() response: FastifyReply) {
    try {
      const data = await this.resultsService.statistics();
      return response.status(HttpStatus.OK).send({ status: 'success', data });
    } catch (error) {
      this.logger.error(`Could not compute statistics: ${describeError(error)}`);
      return response.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        status: 'error',
        message: 'Failed to compute statistics.',
      });
    }
  }

  private view(record: AnalysisResult): ResultView {
    return toResultView(record, this.resultsService.imageUrl(record));
  }
}
