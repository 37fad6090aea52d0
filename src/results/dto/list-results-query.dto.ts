import { ApiPropertyOptional } from '@nestjs/swagger';

export class ListResultsQueryDto {
  @ApiPropertyOptional({ description: 'Page number, clamped to the available pages', example: '1' })
  page?: string;

  @ApiPropertyOptional({ description: 'Case-insensitive substring of the prediction label' })
  search?: string;

  @ApiPropertyOptional({ description: 'One-shot message shown after a redirect' })
  notice?: string;
}
