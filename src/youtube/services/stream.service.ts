import { Injectable, Logger } from '@nestjs/common';
import { RetrievalFailure, VideoStreamInfo } from '../interfaces/video-info.interface';
import { ytDlpInfoSchema } from '../schemas/yt-dlp.schema';
import { VideoFormatService } from './video-format.service';
import { YtDlpCommandService } from './yt-dlp.service';

export type StreamOutcome =
  | { ok: true; info: VideoStreamInfo }
  | { ok: false; failure: RetrievalFailure };

@Injectable()
export class VideoStreamService {
  private readonly logger = new Logger(VideoStreamService.name);

  constructor(
    private readonly ytDlpCommandService: YtDlpCommandService,
    private readonly videoFormatService: VideoFormatService,
  ) { }

  /**
   * Obtiene y clasifica todos los streams disponibles de un video
   */
  async fetchStreams(videoId: string): Promise<StreamOutcome> {
    const outcome = await this.ytDlpCommandService.fetchVideoJson(videoId);
    if (!outcome.ok) {
      return outcome;
    }

    return this.parseStreams(outcome.stdout);
  }

  parseStreams(stdout: string): StreamOutcome {
    let json: unknown;
    try {
      json = JSON.parse(stdout.trim());
    } catch (error) {
      return {
        ok: false,
        failure: {
          kind: 'upstream-error',
          detail: `No se pudo parsear la salida de yt-dlp: ${error instanceof Error ? error.message : String(error)}`,
        },
      };
    }

    const parsed = ytDlpInfoSchema.safeParse(json);
    if (!parsed.success) {
      return {
        ok: false,
        failure: { kind: 'upstream-error', detail: 'La salida de yt-dlp no tiene el formato esperado' },
      };
    }

    const info = this.videoFormatService.toStreamInfo(parsed.data);
    const { progressive, videoOnly, audioOnly } = info.catalog;
    this.logger.log(
      `📊 ${progressive.length} progresivos, ${videoOnly.length} solo video, ${audioOnly.length} solo audio`,
    );

    return { ok: true, info };
  }
}
