import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/config.module';
import { HealthController } from './health/health.controller';
import { YoutubeModule } from './youtube/youtube.module';

@Module({
  imports: [AppConfigModule, YoutubeModule],
  controllers: [HealthController],
})
export class AppModule { }
