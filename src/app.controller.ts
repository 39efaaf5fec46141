import { Controller, Get } from '@nestjs/common';
import { AppService, ApiInfo } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('api')
  getApiInfo(): ApiInfo {
    return this.appService.getApiInfo();
  }
}
