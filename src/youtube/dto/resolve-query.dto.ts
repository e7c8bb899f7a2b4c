import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { StreamType } from '../interfaces/video-info.interface';
import { VideoQueryDto } from './video-query.dto';

/**
 * "true"/"1" y "false"/"0" (sin distinguir mayúsculas) se convierten a boolean;
 * cualquier otro valor se deja tal cual para que IsBoolean lo rechace
 */
export function parseBooleanFlag(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

const STREAM_TYPES: StreamType[] = ['video', 'audio', 'both'];

export class ResolveQueryDto extends VideoQueryDto {
  @ApiPropertyOptional({
    description: 'Enlaces a devolver',
    enum: STREAM_TYPES,
    default: 'both',
  })
  @IsOptional()
  @IsIn(STREAM_TYPES, { message: 'El parámetro type debe ser video, audio o both' })
  type: StreamType = 'both';

  @ApiPropertyOptional({
    description: 'Calidad: high, medium, low o una altura como 720p',
    default: 'high',
    example: '720p',
  })
  @IsOptional()
  @IsString()
  @MaxLength(16)
  quality: string = 'high';

  @ApiPropertyOptional({
    description: 'Redirigir al enlace en lugar de devolver JSON (solo con type video o audio)',
    default: false,
  })
  @IsOptional()
  @Transform(({ value }) => parseBooleanFlag(value))
  @IsBoolean({ message: 'El parámetro download debe ser true o false' })
  download: boolean = false;
}
