import { Test } from '@nestjs/testing';
import { APP_CONFIG, loadConfig } from '../../config/app.config';
import { StreamLinkService } from './link.service';
import { StreamOutcome, VideoStreamService } from './stream.service';
import { VideoFormatService } from './video-format.service';

const VIDEO_ID = 'kV1qVKlseIU';

async function createService(linkSource: string, outcome?: StreamOutcome): Promise<StreamLinkService> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      StreamLinkService,
      VideoFormatService,
      {
        provide: VideoStreamService,
        useValue: {
          fetchStreams: async (): Promise<StreamOutcome> =>
            outcome ?? { ok: false, failure: { kind: 'upstream-error', detail: 'sin yt-dlp' } },
        },
      },
      { provide: APP_CONFIG, useValue: loadConfig({ LINK_SOURCE: linkSource }) },
    ],
  }).compile();

  return moduleRef.get(StreamLinkService);
}

describe('StreamLinkService', () => {
  describe('guessed links', () => {
    it('builds googlevideo links for the requested quality', async () => {
      const service = await createService('guessed');

      const links = await service.resolveLinks(VIDEO_ID, { type: 'both', quality: 'medium' });

      expect(links).toEqual({
        source: 'guessed',
        video: {
          url: 'https://rr2---sn-4g5ednsl.googlevideo.com/videoplayback?ip=0.0.0.0&id=kV1qVKlseIU&itag=18&source=youtube&requiressl=yes&ratebypass=yes',
          quality: '360p',
          bitrate: null,
          sizeMb: null,
          verified: false,
        },
        audio: {
          url: 'https://rr2---sn-4g5ednsl.googlevideo.com/videoplayback?ip=0.0.0.0&id=kV1qVKlseIU&itag=140&source=youtube&requiressl=yes&ratebypass=yes',
          quality: null,
          bitrate: '128kbps',
          sizeMb: null,
          verified: false,
        },
      });
    });

    it('falls back to high quality for unknown selectors', async () => {
      const service = await createService('guessed');

      const links = await service.resolveLinks(VIDEO_ID, { type: 'video', quality: 'ultra' });

      expect(links.video?.url).toContain('&itag=22&');
      expect(links.audio).toBeUndefined();
    });

    it('uses the low quality audio itag', async () => {
      const service = await createService('guessed');

      const links = service.guessedLinks(VIDEO_ID, 'audio', 'LOW');

      expect(links.video).toBeUndefined();
      expect(links.audio?.url).toContain('&itag=139&');
      expect(links.audio?.bitrate).toBe('48kbps');
    });
  });

  describe('placeholder links', () => {
    it('derives deterministic links from the identifier', async () => {
      const service = await createService('placeholder');

      const links = await service.resolveLinks(VIDEO_ID, { type: 'both', quality: 'high' });

      expect(links.source).toBe('placeholder');
      expect(links.video?.url).toBe('https://dl.ymcdn.org/04caafe31b0869a0601e4912f5170a6d/kV1qVKlseIU');
      expect(links.audio?.url).toBe('https://dl.ymcdn.org/8ce857f5628c8c6d3fdde2a01f30e01b/kV1qVKlseIU');
      expect(links.video?.verified).toBe(false);
    });
  });

  describe('extracted links', () => {
    const outcome: StreamOutcome = {
      ok: true,
      info: {
        videoId: VIDEO_ID,
        title: 'Test Video',
        durationSeconds: 125,
        catalog: {
          progressive: [
            {
              formatId: '43', ext: 'webm', url: 'https://cdn.test/43', width: 1280, height: 720, fps: 30,
              vcodec: 'vp8', acodec: 'vorbis', totalBitrate: 1500, audioBitrate: null, filesize: null,
            },
            {
              formatId: '18', ext: 'mp4', url: 'https://cdn.test/18', width: 640, height: 360, fps: 30,
              vcodec: 'avc1', acodec: 'mp4a', totalBitrate: 500, audioBitrate: 96, filesize: 2097152,
            },
          ],
          videoOnly: [],
          audioOnly: [
            {
              formatId: '140', ext: 'm4a', url: 'https://cdn.test/140', width: null, height: null, fps: null,
              vcodec: 'none', acodec: 'mp4a', totalBitrate: 130, audioBitrate: 129.5, filesize: 3145728,
            },
          ],
        },
      },
    };

    it('prefers mp4 progressive streams and reports sizes in MiB', async () => {
      const service = await createService('extracted', outcome);

      const links = await service.resolveLinks(VIDEO_ID, { type: 'both', quality: 'high' });

      expect(links).toEqual({
        source: 'extracted',
        video: { url: 'https://cdn.test/18', quality: '360p', bitrate: '96kbps', sizeMb: 2, verified: true },
        audio: { url: 'https://cdn.test/140', quality: null, bitrate: '130kbps', sizeMb: 3, verified: true },
      });
    });

    it('degrades to guessed links when yt-dlp fails', async () => {
      const service = await createService('extracted');

      const links = await service.resolveLinks(VIDEO_ID, { type: 'audio', quality: 'high' });

      expect(links.source).toBe('guessed');
      expect(links.audio?.url).toContain('&itag=140&');
    });
  });
});
