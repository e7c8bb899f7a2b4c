import { BadGatewayException, BadRequestException } from '@nestjs/common';

/**
 * La entrada no coincide con ningún formato de URL o ID de YouTube
 */
export class InvalidVideoIdException extends BadRequestException {
  constructor() {
    super('URL de YouTube inválida. Proporcione una URL o un ID de video válido');
  }
}

/**
 * YouTube (o yt-dlp) no devolvió datos utilizables y el endpoint los necesita
 */
export class UpstreamUnavailableException extends BadGatewayException {
  constructor(message: string) {
    super(message);
  }
}
