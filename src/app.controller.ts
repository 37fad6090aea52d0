import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

@ApiTags('health')
@Controller()
export class AppController {
  @ApiOperation({ summary: 'Liveness check' })
  @Get('/ping')
  checkHealth(): { status: boolean; message: string } {
    return {
      status: true,
      message: 'Image classifier service is working',
    };
  }
}
