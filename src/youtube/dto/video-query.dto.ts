import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class VideoQueryDto {
  @ApiProperty({
    description: 'URL de YouTube o ID de video de 11 caracteres',
    example: 'https://youtu.be/kV1qVKlseIU',
  })
  @IsString({ message: 'El parámetro url debe ser texto' })
  @IsNotEmpty({ message: 'El parámetro url es obligatorio' })
  url!: string;
}
