import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

export interface ApiErrorBody {
  statusCode: number;
  message: string | string[];
  timestamp: string;
  path: string;
}

@Injectable()
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    if (!(exception instanceof HttpException)) {
      this.logger.error(
        `[HTTP] ${request.method} ${request.url} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    const body: ApiErrorBody = {
      statusCode: status,
      message: exception instanceof HttpException ? responseMessage(exception) : 'Internal server error',
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(status).json(body);
  }
}

// Validation errors arrive as { message: string[] }
function responseMessage(exception: HttpException): string | string[] {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return payload;
  }
  if ('message' in payload) {
    const { message } = payload;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
      return message;
    }
  }
  return exception.message;
}
