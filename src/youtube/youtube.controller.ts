import {
  Controller,
  Get,
  HttpStatus,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
} from '@nestjs/swagger';
import { YoutubeService } from './youtube.service';
import { ResolveQueryDto } from './dto/resolve-query.dto';
import { VideoQueryDto } from './dto/video-query.dto';
import { FormatsPayload, InfoPayload } from './interfaces/video-info.interface';

const errorSchema = (example: string) => ({
  type: 'object',
  properties: {
    error: { type: 'string', example },
  },
});

@ApiTags('youtube')
@Controller('api')
export class YoutubeController {
  constructor(private readonly youtubeService: YoutubeService) { }

  @Get('resolve')
  @ApiOperation({
    summary: 'Resolver enlaces de un video de YouTube',
    description: 'Extrae el ID del video, obtiene sus metadatos y devuelve enlaces de descarga. ' +
      'Con download=true y type video o audio redirige directamente al enlace.',
  })
  @ApiResponse({ status: 200, description: 'Metadatos y enlaces del video' })
  @ApiResponse({ status: 302, description: 'Redirección al enlace de descarga' })
  @ApiResponse({
    status: 400,
    description: 'URL o ID inválido',
    schema: errorSchema('URL de YouTube inválida. Proporcione una URL o un ID de video válido'),
  })
  @ApiResponse({
    status: 502,
    description: 'No hay enlace disponible para redirigir',
    schema: errorSchema('No hay enlace de video disponible'),
  })
  async resolve(
    @Query() query: ResolveQueryDto,
    @Res() res: Response,
  ): Promise<void> {
    const result = await this.youtubeService.resolve(query.url, {
      type: query.type,
      quality: query.quality,
      download: query.download,
    });

    if (result.kind === 'redirect') {
      res.redirect(HttpStatus.FOUND, result.location);
      return;
    }

    res.status(HttpStatus.OK).json(result.payload);
  }

  @Get('info')
  @ApiOperation({
    summary: 'Información del video',
    description: 'Título, autor, duración, miniaturas y URL de inserción, sin enlaces de descarga',
  })
  @ApiResponse({ status: 200, description: 'Metadatos del video' })
  @ApiResponse({ status: 400, description: 'URL o ID inválido', schema: errorSchema('URL de YouTube inválida. Proporcione una URL o un ID de video válido') })
  @ApiResponse({ status: 502, description: 'YouTube no devolvió metadatos', schema: errorSchema('No se pudo obtener la información del video (not-found): HTTP 404 desde www.youtube.com') })
  async info(@Query() query: VideoQueryDto): Promise<InfoPayload> {
    return this.youtubeService.getVideoInfo(query.url);
  }

  @Get('formats')
  @ApiOperation({
    summary: 'Formatos disponibles',
    description: 'Todos los streams del video agrupados en progresivos, solo video y solo audio, de mayor a menor calidad',
  })
  @ApiResponse({ status: 200, description: 'Formatos del video' })
  @ApiResponse({ status: 400, description: 'URL o ID inválido', schema: errorSchema('URL de YouTube inválida. Proporcione una URL o un ID de video válido') })
  @ApiResponse({ status: 502, description: 'yt-dlp no pudo obtener los formatos', schema: errorSchema('No se pudieron obtener los formatos del video') })
  async formats(@Query() query: VideoQueryDto): Promise<FormatsPayload> {
    return this.youtubeService.getFormats(query.url);
  }
}
