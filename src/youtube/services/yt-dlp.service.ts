import { Inject, Injectable, Logger } from '@nestjs/common';
import { exec } from 'child_process';
import { promisify } from 'util';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { RetrievalFailure, RetrievalFailureKind } from '../interfaces/video-info.interface';
import { VideoUrlService } from './url.service';

const execAsync = promisify(exec);

export type YtDlpOutcome =
  | { ok: true; stdout: string }
  | { ok: false; failure: RetrievalFailure };

/**
 * Clasifica el mensaje de error de yt-dlp
 */
export function classifyYtDlpError(message: string, killed = false): RetrievalFailureKind {
  if (killed) return 'timeout';
  if (message.includes('Sign in to confirm you\'re not a bot') || message.includes('HTTP Error 429')) {
    return 'rate-limited';
  }
  if (
    message.includes('Sign in to confirm your age') ||
    message.includes('Private video') ||
    message.includes('members-only')
  ) {
    return 'restricted';
  }
  if (message.includes('Video unavailable') || message.includes('HTTP Error 404')) {
    return 'not-found';
  }
  if (message.includes('Unable to download') || message.includes('getaddrinfo')) {
    return 'network-error';
  }
  return 'upstream-error';
}

@Injectable()
export class YtDlpCommandService {
  private readonly logger = new Logger(YtDlpCommandService.name);
  private readonly USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
  ];

  constructor(
    private readonly videoUrlService: VideoUrlService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) { }

  /**
   * Construye el comando para obtener la información del video en JSON.
   * Solo recibe IDs ya validados, por lo que la URL no necesita escape adicional.
   */
  buildInfoCommand(videoId: string, userAgent: string = this.getRandomUserAgent()): string {
    let command = `${this.config.ytDlpBin} -j --no-playlist --no-check-certificate --no-warnings`;
    command += ` --user-agent "${userAgent}"`;
    command += ' --extractor-retries 1';
    command += ` "${this.videoUrlService.watchUrl(videoId)}"`;
    return command;
  }

  /**
   * Ejecuta yt-dlp y devuelve stdout o el fallo clasificado
   */
  async fetchVideoJson(videoId: string): Promise<YtDlpOutcome> {
    const command = this.buildInfoCommand(videoId);

    try {
      this.logger.log(`🔧 Ejecutando comando: ${command}`);

      const { stdout, stderr } = await execAsync(command, {
        timeout: this.config.ytDlpTimeoutMs,
        maxBuffer: 1024 * 1024 * 10, // 10MB buffer
      });

      if (stderr && !stderr.includes('WARNING')) {
        this.logger.warn(`yt-dlp stderr: ${stderr}`);
      }

      if (!stdout.trim()) {
        return { ok: false, failure: { kind: 'upstream-error', detail: 'yt-dlp no devolvió información' } };
      }

      return { ok: true, stdout };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const killed = typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
      const kind = classifyYtDlpError(message, killed);

      this.logger.error(`❌ Error ejecutando yt-dlp (${kind}): ${message}`);
      return { ok: false, failure: { kind, detail: `Error ejecutando yt-dlp: ${message}` } };
    }
  }

  private getRandomUserAgent(): string {
    return this.USER_AGENTS[Math.floor(Math.random() * this.USER_AGENTS.length)];
  }
}
