import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { RetrievalFailure, RetrievalFailureKind } from '../interfaces/video-info.interface';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export type HttpOutcome =
  | { ok: true; status: number; body: string }
  | { ok: false; failure: RetrievalFailure };

export interface GetTextOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Clasifica un código HTTP distinto de 2xx
 */
export function classifyHttpStatus(status: number): RetrievalFailureKind {
  if (status === 404 || status === 410) return 'not-found';
  if (status === 401 || status === 403) return 'restricted';
  if (status === 429) return 'rate-limited';
  return 'upstream-error';
}

/**
 * Clasifica un error de transporte (sin respuesta del servidor)
 */
export function classifyRequestError(error: unknown): RetrievalFailure {
  if (isAxiosError(error)) {
    const kind: RetrievalFailureKind = error.code && TIMEOUT_CODES.has(error.code) ? 'timeout' : 'network-error';
    return { kind, detail: error.message };
  }
  return {
    kind: 'network-error',
    detail: error instanceof Error ? error.message : String(error),
  };
}

@Injectable()
export class YoutubeHttpService {
  private readonly logger = new Logger(YoutubeHttpService.name);
  private readonly client: AxiosInstance;

  constructor() {
    this.client = axios.create({
      responseType: 'text',
      maxRedirects: 5,
      // Los códigos de error se clasifican aquí, no como excepciones
      validateStatus: () => true,
    });
  }

  /**
   * GET que nunca lanza: devuelve el cuerpo como texto o el fallo clasificado
   */
  async getText(url: string, options: GetTextOptions): Promise<HttpOutcome> {
    try {
      this.logger.debug(`🌐 GET ${url}`);
      const response = await this.client.get<string>(url, {
        timeout: options.timeoutMs,
        headers: options.headers,
      });

      if (response.status >= 200 && response.status < 300) {
        return { ok: true, status: response.status, body: String(response.data) };
      }

      return {
        ok: false,
        failure: {
          kind: classifyHttpStatus(response.status),
          detail: `HTTP ${response.status} desde ${new URL(url).hostname}`,
        },
      };
    } catch (error) {
      const failure = classifyRequestError(error);
      this.logger.warn(`❌ Falló la petición a ${url}: ${failure.detail}`);
      return { ok: false, failure };
    }
  }
}
