import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { AppError } from '../errors/app.error';

@Catch(AppError)
export class AppErrorFilter implements ExceptionFilter<AppError> {
  private readonly logger = new Logger(AppErrorFilter.name);

  catch(error: AppError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (error.statusCode >= 500) {
      this.logger.error(`${error.code}: ${error.message}`);
    } else {
      this.logger.warn(`${error.code}: ${error.message}`);
    }

    response.status(error.statusCode).json({
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
    });
  }
}
