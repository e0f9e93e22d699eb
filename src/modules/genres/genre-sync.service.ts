import { Genre } from '@/database/entities';
import { TmdbService } from '@/modules/metadata/tmdb.service';
import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, Not } from 'typeorm';
import { GenreSyncResult } from './types/genre.type';

/**
 * Mirrors the provider's genre list into the local `genres` table, keyed by
 * the provider's genre id.
 */
@Injectable()
export class GenreSyncService implements OnApplicationBootstrap {
  private readonly logger = new Logger(GenreSyncService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly tmdbService: TmdbService,
    private readonly config: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.get<boolean>('tmdb.syncGenresOnStartup', false)) return;
    if (!this.tmdbService.isConfigured()) {
      this.logger.warn('Genre sync on startup skipped: TMDB_API_KEY not set');
      return;
    }

    try {
      await this.sync();
    } catch (error) {
      this.logger.error(
        'Genre sync on startup failed',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * Inserts new provider genres and renames existing ones. A provider genre
   * whose name is already used by a different local id is skipped.
   */
  async sync(): Promise<GenreSyncResult> {
    const provided = await this.tmdbService.fetchGenres();

    const result = await this.dataSource.transaction(async (manager) => {
      const genres = manager.getRepository(Genre);
      let synced = 0;
      let skipped = 0;

      for (const { id, name } of provided) {
        if (await genres.existsBy({ name, id: Not(id) })) {
          this.logger.warn(
            `Skipping provider genre ${id} "${name}": name used by another genre`,
          );
          skipped++;
          continue;
        }

        const existing = await genres.findOneBy({ id });
        if (!existing) {
          await genres.insert({ id, name });
        } else if (existing.name !== name) {
          await genres.update(id, { name });
        }
        synced++;
      }

      return { synced, skipped };
    });

    this.logger.log(
      `Genre sync finished: ${result.synced} synced, ${result.skipped} skipped`,
    );
    return result;
  }
}
