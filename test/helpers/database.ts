import { ENTITIES } from '@/database/entities';
import { DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

/**
 * In-memory SQLite connection with the full schema plus a repository for
 * every entity.
 */
export const sqliteTestingModules = (): DynamicModule[] => [
  TypeOrmModule.forRoot({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    synchronize: true,
    dropSchema: true,
  }),
  TypeOrmModule.forFeature(ENTITIES),
];
