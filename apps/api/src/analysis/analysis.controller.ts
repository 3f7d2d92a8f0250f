import { Body, Controller, Get, Header, HttpCode, HttpStatus, Post, StreamableFile } from '@nestjs/common';
import { AnalysisService } from './analysis.service';
import { AnalyzeSnapshotDto } from './dto/analyze-snapshot.dto';
import { AnalyzeCsvDto } from './dto/analyze-csv.dto';

/**
 * Analysis controller
 */
@Controller('analysis')
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  analyze(@Body() dto: AnalyzeSnapshotDto) {
    return this.analysisService.analyzeSnapshot(dto);
  }

  @Post('csv')
  @HttpCode(HttpStatus.OK)
  analyzeCsv(@Body() dto: AnalyzeCsvDto) {
    return this.analysisService.analyzeCsv(dto);
  }

  @Post('report')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
  @Header('Content-Disposition', 'attachment; filename="anomaly-report.xlsx"')
  report(@Body() dto: AnalyzeCsvDto): StreamableFile {
    return new StreamableFile(this.analysisService.renderReport(dto));
  }

  @Get('rules')
  listRules() {
    return this.analysisService.listRules();
  }

  @Get('catalog')
  listCatalog() {
    return this.analysisService.listCatalog();
  }
}
