import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';

@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Liveness' })
  getHealth() {
    return this.appService.getHealth();
  }

  @Get('test')
  @ApiOperation({ summary: 'Store connectivity diagnostics' })
  async getDiagnostics() {
    return this.appService.getDiagnostics();
  }
}
