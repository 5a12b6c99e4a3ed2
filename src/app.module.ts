import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { extractionConfig } from '@/config/extraction.config';
import { ExtractionModule } from '@/modules/extraction/extraction.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [extractionConfig] }), ExtractionModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
