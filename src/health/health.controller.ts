import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SERVICE_NAME, SERVICE_VERSION } from '../app.constants';

@ApiTags('health')
@Controller()
export class HealthController {

  @Get()
  @ApiOperation({
    summary: 'Índice del servicio',
    description: 'Lista los endpoints disponibles con un ejemplo de uso',
  })
  index() {
    return {
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        '/api/resolve': 'GET /api/resolve?url=YOUTUBE_URL&type=both&quality=high&download=false',
        '/api/info': 'GET /api/info?url=YOUTUBE_URL',
        '/api/formats': 'GET /api/formats?url=YOUTUBE_URL',
        '/health': 'GET /health',
        '/docs': 'Documentación OpenAPI',
      },
      example: '/api/resolve?url=https://youtu.be/kV1qVKlseIU',
    };
  }

  @Get('health')
  @ApiOperation({
    summary: 'Prueba de vida',
    description: 'Respuesta fija con nombre, versión, hora actual y segundos en marcha; no consulta a YouTube ni a yt-dlp',
  })
  @ApiResponse({
    status: 200,
    description: 'El proceso está en marcha',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        service: { type: 'string', example: SERVICE_NAME },
        version: { type: 'string', example: SERVICE_VERSION },
        timestamp: { type: 'string', example: '2025-01-01T00:00:00.000Z' },
        uptime_s: { type: 'number', example: 42 },
      }
    }
  })
  healthCheck() {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
      uptime_s: Math.round(process.uptime()),
    };
  }
}
