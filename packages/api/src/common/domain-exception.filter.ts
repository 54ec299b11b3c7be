import { ArgumentsHost, Catch, ExceptionFilter, Logger } from "@nestjs/common";
import type { Response } from "express";
import { DomainError } from "./domain-error";

@Catch(DomainError)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: DomainError, host: ArgumentsHost) {
    const status = exception.status;
    if (status >= 500) {
      this.logger.error(`${exception.name} ${exception.code}: ${exception.message}`);
    }

    const res = host.switchToHttp().getResponse<Response>();
    res.status(status).json({
      statusCode: status,
      error: exception.code,
      message: exception.message,
      ...exception.details(),
    });
  }
}
