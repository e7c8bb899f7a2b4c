import { Module } from '@nestjs/common';
import { YoutubeService } from './youtube.service';
import { YoutubeController } from './youtube.controller';
import { CLOCK, Clock } from './interfaces/video-info.interface';
import { VideoUrlService } from './services/url.service';
import { YoutubeHttpService } from './services/http.service';
import { VideoMetadataService } from './services/metadata.service';
import { VideoFormatService } from './services/video-format.service';
import { YtDlpCommandService } from './services/yt-dlp.service';
import { VideoStreamService } from './services/stream.service';
import { StreamLinkService } from './services/link.service';
import { ResponseComposerService } from './services/response.service';

const systemClock: Clock = { now: () => Date.now() };

@Module({
  controllers: [YoutubeController],
  providers: [
    VideoUrlService,
    YoutubeHttpService,
    VideoMetadataService,
    VideoFormatService,
    YtDlpCommandService,
    VideoStreamService,
    StreamLinkService,
    ResponseComposerService,
    YoutubeService,
    { provide: CLOCK, useValue: systemClock },
  ],
})
export class YoutubeModule { }
