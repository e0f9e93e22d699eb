import { Genre } from '@/database/entities';
import { MetadataModule } from '@/modules/metadata/metadata.module';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GenreSyncService } from './genre-sync.service';
import { GenresController } from './genres.controller';
import { GenresService } from './genres.service';

@Module({
  imports: [TypeOrmModule.forFeature([Genre]), MetadataModule],
  controllers: [GenresController],
  providers: [GenresService, GenreSyncService],
})
export class GenresModule {}
