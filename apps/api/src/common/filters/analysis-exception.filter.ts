import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { AnalysisError } from '@variance-review/analytics/errors/analysis-errors';

/**
 * Maps engine failures (configuration, alignment, parsing) to 422 responses
 */
@Catch(AnalysisError)
export class AnalysisExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AnalysisExceptionFilter.name);

  catch(exception: AnalysisError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    this.logger.warn(`${exception.code}: ${exception.message}`);

    response.status(HttpStatus.UNPROCESSABLE_ENTITY).json({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      error: exception.code,
      message: exception.message,
      details: exception.details,
    });
  }
}
