import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

export interface ErrorBody {
  error: string;
}

/**
 * Extrae un mensaje legible de la respuesta de una HttpException.
 * Los errores del ValidationPipe llegan como arreglo de mensajes.
 */
export function describeHttpException(exception: HttpException): string {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return response;
  }

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.map(item => String(item)).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }

  return exception.message;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    if (res.headersSent) {
      this.logger.error('❌ Error después de enviar la respuesta', exception instanceof Error ? exception.stack : String(exception));
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body: ErrorBody = { error: describeHttpException(exception) };
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.warn(`⚠️ ${status}: ${body.error}`);
      }
      res.status(status).json(body);
      return;
    }

    this.logger.error(
      `❌ Error inesperado: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    const body: ErrorBody = { error: 'Error interno del servidor' };
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
