import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Response } from "express";

type ErrorBody = Record<string, unknown> & {
  statusCode: number;
  message: unknown;
  timestamp: string;
};

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    response.status(this.statusOf(exception)).json(this.bodyOf(exception));
  }

  private statusOf(exception: unknown): number {
    return exception instanceof HttpException
      ? exception.getStatus()
      : HttpStatus.INTERNAL_SERVER_ERROR;
  }

  private bodyOf(exception: unknown): ErrorBody {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      this.logger.error(
        "Unhandled exception",
        exception instanceof Error ? exception.stack : String(exception),
      );
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: "Internal server error",
        timestamp,
      };
    }

    const statusCode = exception.getStatus();
    const exceptionResponse = exception.getResponse();
    if (typeof exceptionResponse === "string") {
      return { statusCode, message: exceptionResponse, timestamp };
    }

    // Extra fields (available profiles, validation issues) pass through
    const fields: Record<string, unknown> = Object.fromEntries(Object.entries(exceptionResponse));
    const { statusCode: _status, error: _error, message, ...rest } = fields;
    return {
      ...rest,
      statusCode,
      message: message || exception.message,
      timestamp,
    };
  }
}
