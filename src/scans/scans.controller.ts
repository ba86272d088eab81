import { ErrorHandler } from '@common/utils/error-handler';
import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, Post } from '@nestjs/common';
import { ScansService } from '@scans/scans.service';
import { ScanListEntry, ScanResultsResponse, TriggerScanBody, TriggerScanResponse } from '@types';

@Controller()
export class ScansController {
  private readonly logger = new Logger(ScansController.name);
  private readonly errorHandler = new ErrorHandler(ScansController.name);

  constructor(private readonly scansService: ScansService) {}

  @Post('trigger_scan')
  @HttpCode(HttpStatus.OK)
  async triggerScan(@Body() body: TriggerScanBody | undefined): Promise<TriggerScanResponse> {
    this.logger.log(`Trigger scan request: ${JSON.stringify(body ?? {})}`);
    try {
      return await this.scansService.triggerScan(body ?? {});
    } catch (error) {
      throw this.errorHandler.toHttpException(error);
    }
  }

  @Get('get_results/:scanId')
  async getResults(@Param('scanId') scanId: string): Promise<ScanResultsResponse> {
    try {
      return await this.scansService.getResults(scanId);
    } catch (error) {
      throw this.errorHandler.toHttpException(error);
    }
  }

  @Get('scans')
  listScans(): ScanListEntry[] {
    return this.scansService.listScans();
  }
}
