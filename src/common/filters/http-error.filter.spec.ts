import { BadRequestException, HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { describeHttpException } from './http-error.filter';
import { UpstreamUnavailableException } from '../../youtube/exceptions/video.exceptions';

describe('describeHttpException', () => {
  it('reads plain string messages', () => {
    expect(describeHttpException(new NotFoundException('Sin video'))).toBe('Sin video');
    expect(describeHttpException(new UpstreamUnavailableException('No hay enlace de audio disponible'))).toBe(
      'No hay enlace de audio disponible',
    );
  });

  it('joins validation message arrays', () => {
    const exception = new BadRequestException(['url debe ser texto', 'url es obligatorio']);
    expect(describeHttpException(exception)).toBe('url debe ser texto; url es obligatorio');
  });

  it('uses string responses as they are', () => {
    expect(describeHttpException(new HttpException('Demasiadas peticiones', HttpStatus.TOO_MANY_REQUESTS))).toBe(
      'Demasiadas peticiones',
    );
  });
});
