import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { MetadataController } from './metadata.controller';
import { TmdbService } from './tmdb.service';

@Module({
  imports: [HttpModule.register({ timeout: 10000 })],
  controllers: [MetadataController],
  providers: [TmdbService],
  exports: [TmdbService],
})
export class MetadataModule {}
